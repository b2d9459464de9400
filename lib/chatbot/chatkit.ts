// lib/chatbot/chatkit.ts
// Shared POST helper for the ChatKit workflow API (sessions + messages).
import type { ChatbotConfig } from "./config";
import type { FetchLike } from "./types";

export type StepDeps = {
  config: ChatbotConfig;
  fetch?: FetchLike;
  /** Aborted when the inbound caller goes away. */
  signal?: AbortSignal;
};

export function withTimeout(ms: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

export async function postChatKit(
  path: "/v1/chatkit/sessions" | "/v1/chatkit/messages",
  bearer: string,
  body: unknown,
  timeoutMs: number,
  deps: StepDeps
): Promise<Response> {
  const doFetch = deps.fetch ?? fetch;
  return doFetch(`${deps.config.chatkitBase}${path}`, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${bearer}`,
      "OpenAI-Beta": "chatkit_beta=v1",
    },
    body: JSON.stringify(body),
    signal: withTimeout(timeoutMs, deps.signal),
  });
}
