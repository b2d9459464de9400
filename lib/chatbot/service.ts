// lib/chatbot/service.ts
// Request orchestration: session -> message -> (on any failure) fallback.
// Each call happens once, in order; nothing is retried.
import { sendMessage } from "./dispatch";
import { ChatbotError, type StepResult } from "./errors";
import { completeWithFallback } from "./fallback";
import { createSession, type SessionDeps } from "./session";
import type { ChatbotOutcome, ChatMessage, ChatRequest } from "./types";

export type ChatbotDeps = SessionDeps;

async function runPrimary(
  messages: readonly ChatMessage[],
  sessionId: string | undefined,
  deps: ChatbotDeps
): Promise<StepResult<string>> {
  const session = await createSession(sessionId, deps);
  if (!session.ok) return session;
  return sendMessage(session.value, messages, deps);
}

export async function handleChatbotMessage(
  request: ChatRequest,
  deps: ChatbotDeps
): Promise<ChatbotOutcome> {
  const { messages, sessionId } = request;
  if (messages.length === 0) {
    return { kind: "failure", error: new ChatbotError("InvalidRequest", "Messages array is empty") };
  }

  console.info(`[chatbot] Processing message for workflow: ${deps.config.workflowId}`);
  console.info(`[chatbot] Session ID: ${sessionId ?? "new session"}`);

  const primary = await runPrimary(messages, sessionId, deps);
  if (primary.ok) return { kind: "primary", content: primary.value };

  console.error(`[chatbot] Error processing chatbot message (${primary.error.kind}): ${primary.error.message}`);
  const fallback = await completeWithFallback(messages, deps);
  if (fallback.ok) return { kind: "fallback", content: fallback.value, cause: primary.error };

  console.error(`[chatbot] Fallback also failed: ${fallback.error.message}`);
  return { kind: "failure", error: fallback.error };
}
