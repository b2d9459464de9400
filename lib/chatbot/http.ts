// lib/chatbot/http.ts
// Maps the inbound body + environment to a status and JSON body.
// The Next.js route only moves these onto the response.
import { loadChatbotConfig, type Env } from "./config";
import { ChatbotError, type ChatbotErrorKind } from "./errors";
import { handleChatbotMessage, type ChatbotDeps } from "./service";
import { ChatRequestSchema, type ChatbotOutcome, type ChatResponse, type ErrorBody } from "./types";

export type HttpResult = { status: number; body: ChatResponse | ErrorBody };

const STATUS_BY_KIND: Record<ChatbotErrorKind, number> = {
  Unconfigured: 500,
  InvalidRequest: 400,
  ProtocolError: 500,
  UpstreamTimeout: 500,
  ParseFailure: 500,
  FallbackFailed: 500,
};

export function toHttpResult(outcome: ChatbotOutcome, workflowId: string): HttpResult {
  switch (outcome.kind) {
    case "primary":
      return { status: 200, body: { content: outcome.content, workflowId } };
    case "fallback":
      return { status: 200, body: { content: outcome.content, workflowId, fallback: true } };
    case "failure": {
      const body: ErrorBody = { error: outcome.error.message };
      if (outcome.issues) body.issues = outcome.issues;
      return { status: STATUS_BY_KIND[outcome.error.kind], body };
    }
  }
}

export async function respondToChatbotRequest(
  body: unknown,
  env: Env,
  deps: Omit<ChatbotDeps, "config"> = {}
): Promise<HttpResult> {
  const config = loadChatbotConfig(env);
  if (!config.ok) {
    console.error(`[chatbot] ${config.error.message}`);
    return toHttpResult({ kind: "failure", error: config.error }, "");
  }

  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return toHttpResult(
      {
        kind: "failure",
        error: new ChatbotError("InvalidRequest", "Invalid request body"),
        issues: parsed.error.issues,
      },
      config.value.workflowId
    );
  }

  const outcome = await handleChatbotMessage(parsed.data, { ...deps, config: config.value });
  return toHttpResult(outcome, config.value.workflowId);
}
