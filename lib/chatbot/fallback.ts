// lib/chatbot/fallback.ts
// Secondary path: plain (non-stream) chat completions with the service key.
// Used only when the workflow path failed; its errors are terminal.
import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { StepDeps } from "./chatkit";
import { ChatbotError, fail, ok, type StepResult } from "./errors";
import type { ChatMessage } from "./types";

function toCompletionMessage(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    default:
      return { role: "user", content: m.content };
  }
}

export function buildFallbackMessages(
  systemPrompt: string,
  messages: readonly ChatMessage[]
): ChatCompletionMessageParam[] {
  return [{ role: "system", content: systemPrompt }, ...messages.map(toCompletionMessage)];
}

function describeFailure(err: unknown): string {
  if (err instanceof OpenAI.APIConnectionTimeoutError) return "Fallback API timed out";
  if (err instanceof OpenAI.APIUserAbortError) return "Fallback API request aborted";
  if (err instanceof OpenAI.APIError && err.status !== undefined) return `Fallback API error: ${err.status}`;
  if (err instanceof Error) return `Fallback API request failed: ${err.message}`;
  return "Fallback API request failed";
}

export async function completeWithFallback(
  messages: readonly ChatMessage[],
  deps: StepDeps
): Promise<StepResult<string>> {
  const { config } = deps;
  if (messages.length === 0) {
    return fail(new ChatbotError("InvalidRequest", "Messages array is empty"));
  }
  console.info("[chatbot] Using fallback Chat Completions API");

  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.openaiBase,
    timeout: config.fallbackTimeoutMs,
    maxRetries: 0,
    fetch: deps.fetch,
  });

  try {
    const completion = await client.chat.completions.create(
      { model: config.fallbackModel, messages: buildFallbackMessages(config.systemPrompt, messages) },
      { signal: deps.signal }
    );
    const content = completion.choices[0]?.message?.content;
    if (typeof content !== "string") {
      return fail(new ChatbotError("FallbackFailed", "Could not find content in response"));
    }
    return ok(content);
  } catch (err) {
    const detail = describeFailure(err);
    console.error(`[chatbot] ${detail}`);
    const status = err instanceof OpenAI.APIError ? err.status : undefined;
    return fail(new ChatbotError("FallbackFailed", detail, { status, cause: err }));
  }
}
