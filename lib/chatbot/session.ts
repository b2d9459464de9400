// lib/chatbot/session.ts
// Session establishment: trade the service API key for a short-lived client secret.
import { nanoid } from "nanoid";
import { z } from "zod";
import { postChatKit, type StepDeps } from "./chatkit";
import { ChatbotError, fail, ok, toChatbotError, type StepResult } from "./errors";
import { extractStringField, findKeyed, previewText } from "./escape";

const ClientSecretSchema = z.union([z.string().min(1), z.object({ value: z.string().min(1) })]);

export type SessionDeps = StepDeps & {
  newUserId?: () => string;
};

export const newUserId = () => `user_${Date.now()}_${nanoid(10)}`;

function secretValue(v: unknown): string | undefined {
  const parsed = ClientSecretSchema.safeParse(v);
  if (!parsed.success) return undefined;
  return typeof parsed.data === "string" ? parsed.data : parsed.data.value;
}

// client_secret is taken from wherever it appears in the body, not only the top level.
export function readClientSecret(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return extractStringField(body, "client_secret") || undefined;
  }
  return findKeyed(json, "client_secret", secretValue);
}

export async function createSession(
  sessionId: string | undefined,
  deps: SessionDeps
): Promise<StepResult<string>> {
  const { config } = deps;
  const user = sessionId || (deps.newUserId ?? newUserId)();
  console.info("[chatbot] Creating ChatKit session...");

  let rsp: Response;
  let text: string;
  try {
    rsp = await postChatKit(
      "/v1/chatkit/sessions",
      config.apiKey,
      { workflow: { id: config.workflowId }, user },
      config.sessionTimeoutMs,
      deps
    );
    text = await rsp.text();
  } catch (err) {
    return fail(toChatbotError(err, "Session creation"));
  }

  if (!rsp.ok) {
    console.error(`[chatbot] Session creation failed: ${rsp.status} - ${previewText(text)}`);
    return fail(
      new ChatbotError("ProtocolError", `Session creation failed: ${rsp.status}`, { status: rsp.status })
    );
  }

  const secret = readClientSecret(text);
  if (!secret) {
    return fail(new ChatbotError("ParseFailure", "Could not find client_secret in response"));
  }
  console.info("[chatbot] Session created, client_secret obtained");
  return ok(secret);
}
