// lib/chatbot/stream.ts
// Rebuilds the assistant text from a line-delimited event body:
//   data: {"delta":{"content":"Hello"}}
//   data: [DONE]
// Frames are consumed in arrival order; a bad frame is logged and skipped.
import { z } from "zod";
import { extractStringField, findKeyed, previewText } from "./escape";

export const EMPTY_REPLY = "I received your message but couldn't generate a response.";

const DATA_PREFIX = "data:";
const DONE = "[DONE]";

const DeltaSchema = z.object({ content: z.string() });

function deltaContent(v: unknown): string | undefined {
  const parsed = DeltaSchema.safeParse(v);
  return parsed.success ? parsed.data.content : undefined;
}

// `delta` may sit at any depth, e.g. {"choices":[{"delta":{...}}]} or {"item":{"delta":{...}}}.
// Frames that are not valid JSON still get a lenient look for delta.content.
export function frameContent(payload: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    const deltaAt = payload.indexOf('"delta"');
    return deltaAt === -1 ? undefined : extractStringField(payload, "content", deltaAt);
  }
  return findKeyed(json, "delta", deltaContent);
}

/** Incremental line splitter; feed chunks, then `finish()` for the result. */
export class DeltaAccumulator {
  // pieces of the incomplete trailing line, joined once its newline arrives
  private pending: string[] = [];
  private parts: string[] = [];

  push(chunk: string): void {
    let nl = chunk.indexOf("\n");
    if (nl === -1) {
      if (chunk) this.pending.push(chunk);
      return;
    }
    this.pending.push(chunk.slice(0, nl));
    this.line(this.pending.join(""));
    this.pending = [];

    let start = nl + 1;
    while ((nl = chunk.indexOf("\n", start)) !== -1) {
      this.line(chunk.slice(start, nl));
      start = nl + 1;
    }
    if (start < chunk.length) this.pending.push(chunk.slice(start));
  }

  finish(): string {
    const rest = this.pending.join("");
    this.pending = [];
    if (rest) this.line(rest);
    const text = this.parts.join("");
    return text ? text : EMPTY_REPLY;
  }

  private line(raw: string): void {
    if (!raw.startsWith(DATA_PREFIX)) return;
    const payload = raw.slice(DATA_PREFIX.length).trim();
    if (!payload || payload === DONE) return;

    const content = frameContent(payload);
    if (content === undefined) {
      console.debug(`[chatbot] Skipping unparseable frame: ${previewText(payload, 200)}`);
      return;
    }
    this.parts.push(content);
  }
}

export function reconstructText(body: string): string {
  const acc = new DeltaAccumulator();
  acc.push(body);
  return acc.finish();
}

export async function reconstructStream(body: ReadableStream<Uint8Array>): Promise<string> {
  const acc = new DeltaAccumulator();
  const reader = body.getReader();
  const decoder = new TextDecoder();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      acc.push(decoder.decode(value, { stream: true }));
    }
    acc.push(decoder.decode());
  } finally {
    reader.releaseLock();
  }
  return acc.finish();
}
