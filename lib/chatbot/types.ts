// lib/chatbot/types.ts
import { z } from "zod";
import type { ChatbotError } from "./errors";

export const ChatMessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

// An empty messages array is accepted here and rejected by the service,
// so it surfaces as InvalidRequest like any other precondition failure.
export const ChatRequestSchema = z.object({
  messages: z.array(ChatMessageSchema),
  sessionId: z
    .string()
    .nullish()
    .transform((v) => (v && v.trim() ? v : undefined)),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ChatRequest = z.output<typeof ChatRequestSchema>;

export type ChatResponse = {
  content: string;
  workflowId: string;
  fallback?: true;
};

export type ErrorBody = {
  error: string;
  issues?: z.ZodIssue[];
};

export type ChatbotOutcome =
  | { kind: "primary"; content: string }
  | { kind: "fallback"; content: string; cause: ChatbotError }
  | { kind: "failure"; error: ChatbotError; issues?: z.ZodIssue[] };

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
