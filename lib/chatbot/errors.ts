// lib/chatbot/errors.ts

export type ChatbotErrorKind =
  | "Unconfigured"
  | "InvalidRequest"
  | "ProtocolError"
  | "UpstreamTimeout"
  | "ParseFailure"
  | "FallbackFailed";

export class ChatbotError extends Error {
  readonly kind: ChatbotErrorKind;
  /** HTTP status of the upstream call, when there was one. */
  readonly status?: number;

  constructor(kind: ChatbotErrorKind, message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ChatbotError";
    this.kind = kind;
    this.status = opts?.status;
  }
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: ChatbotError };

export const ok = <T>(value: T): StepResult<T> => ({ ok: true, value });
export const fail = <T = never>(error: ChatbotError): StepResult<T> => ({ ok: false, error });

function errorName(err: unknown): string {
  return typeof err === "object" && err !== null && "name" in err && typeof err.name === "string"
    ? err.name
    : "";
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "unknown error";
}

// fetch rejects with a DOMException named TimeoutError (AbortSignal.timeout)
// or AbortError (caller went away).
export function toChatbotError(err: unknown, context: string): ChatbotError {
  if (err instanceof ChatbotError) return err;
  const name = errorName(err);
  if (name === "TimeoutError") {
    return new ChatbotError("UpstreamTimeout", `${context} timed out`, { cause: err });
  }
  if (name === "AbortError") {
    return new ChatbotError("UpstreamTimeout", `${context} aborted`, { cause: err });
  }
  return new ChatbotError("ProtocolError", `${context} failed: ${errorMessage(err)}`, { cause: err });
}
