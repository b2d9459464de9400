// lib/chatbot/testUtils.ts
// In-process stand-ins for the upstream services, shared by the *.test.ts files.
import type { ChatbotConfig } from "./config";
import type { FetchLike } from "./types";

export const testConfig: ChatbotConfig = {
  apiKey: "test-key",
  workflowId: "wf_test",
  chatkitBase: "https://chatkit.test",
  openaiBase: "https://openai.test/v1",
  fallbackModel: "gpt-4o-mini",
  sessionTimeoutMs: 1000,
  messageTimeoutMs: 1000,
  fallbackTimeoutMs: 1000,
  systemPrompt: "You are a test assistant.",
};

export const testEnv = {
  OPENAI_API_KEY: "test-key",
  CHATKIT_WORKFLOW_ID: "wf_test",
  CHATKIT_API_BASE: "https://chatkit.test",
  OPENAI_API_BASE: "https://openai.test/v1",
};

export const SESSIONS_URL = "https://chatkit.test/v1/chatkit/sessions";
export const MESSAGES_URL = "https://chatkit.test/v1/chatkit/messages";
export const COMPLETIONS_URL = "https://openai.test/v1/chat/completions";

type Route = (init?: RequestInit) => Response | Promise<Response>;
export type FetchCall = { url: string; init?: RequestInit };

export function fakeFetch(routes: Record<string, Route>) {
  const calls: FetchCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    const route = routes[url];
    if (!route) throw new Error(`unexpected fetch: ${url}`);
    return route(init);
  };
  return { fetch, calls };
}

export const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

export const eventStream = (text: string) =>
  new Response(text, { status: 200, headers: { "content-type": "text/event-stream" } });

export function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const c of chunks) controller.enqueue(c);
      controller.close();
    },
  });
}

export const completion = (content: string | null) => ({
  id: "chatcmpl-test",
  object: "chat.completion",
  created: 0,
  model: "gpt-4o-mini",
  choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
});

// Never settles on its own; rejects with the abort reason once the request signal fires.
export function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return reject(new Error("no signal on request"));
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}

export function bodyOf(call: FetchCall | undefined): unknown {
  return JSON.parse(String(call?.init?.body));
}

export function headerOf(call: FetchCall | undefined, name: string): string | null {
  return new Headers(call?.init?.headers).get(name);
}

export const HELLO_STREAM =
  'data: {"delta":{"content":"Hello"}}\ndata: {"delta":{"content":" there"}}\ndata: [DONE]\n';
