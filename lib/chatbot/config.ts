// lib/chatbot/config.ts
// Everything the core needs from the environment, read once and passed in.
import { ChatbotError, fail, ok, type StepResult } from "./errors";

export type ChatbotConfig = Readonly<{
  apiKey: string;
  workflowId: string;
  chatkitBase: string;
  openaiBase: string;
  fallbackModel: string;
  sessionTimeoutMs: number;
  messageTimeoutMs: number;
  fallbackTimeoutMs: number;
  systemPrompt: string;
}>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_SYSTEM_PROMPT =
  "You are an AI Financial Copilot for a real estate investment platform. " +
  "You help users analyze properties across Europe, calculate ROI for different rental strategies " +
  "(Short-Term, Long-Term, Rent-to-Buy), understand local regulations, and find the best investment opportunities. " +
  "Provide clear, actionable financial advice and insights. Be professional yet friendly.";

const trimSlash = (s: string) => s.replace(/\/+$/, "");

function positiveInt(v: string | undefined, dflt: number): number {
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : dflt;
}

export function loadChatbotConfig(env: Env): StepResult<ChatbotConfig> {
  const apiKey = (env.OPENAI_API_KEY || env.OPENAI_APIKEY || "").trim();
  if (!apiKey) {
    return fail(new ChatbotError("Unconfigured", "OpenAI API key not configured"));
  }
  const workflowId = (env.CHATKIT_WORKFLOW_ID || "").trim();
  if (!workflowId) {
    return fail(new ChatbotError("Unconfigured", "ChatKit workflow id not configured"));
  }

  return ok(
    Object.freeze({
      apiKey,
      workflowId,
      chatkitBase: trimSlash(env.CHATKIT_API_BASE || "https://api.openai.com"),
      openaiBase: trimSlash(env.OPENAI_API_BASE || "https://api.openai.com/v1"),
      fallbackModel: (env.CHATBOT_FALLBACK_MODEL || "gpt-4o-mini").trim(),
      sessionTimeoutMs: positiveInt(env.CHATBOT_SESSION_TIMEOUT_MS, 30_000),
      messageTimeoutMs: positiveInt(env.CHATBOT_MESSAGE_TIMEOUT_MS, 60_000),
      fallbackTimeoutMs: positiveInt(env.CHATBOT_FALLBACK_TIMEOUT_MS, 60_000),
      systemPrompt: env.CHATBOT_SYSTEM_PROMPT?.trim() || DEFAULT_SYSTEM_PROMPT,
    })
  );
}
