// lib/chatbot/handler.ts
// Request/response plumbing for POST /api/chatbot/message.
// Typed structurally so NextApiRequest/NextApiResponse fit without adapters.
import type { Env } from "./config";
import { respondToChatbotRequest } from "./http";

export type RouteRequest = { method?: string; body: unknown };

export interface RouteResponse {
  readonly writableEnded: boolean;
  setHeader(name: string, value: string): unknown;
  status(code: number): { json(body: unknown): void };
  on(event: "close", listener: () => void): unknown;
}

export type ChatbotHandlerOptions = {
  respond?: typeof respondToChatbotRequest;
  env?: Env;
};

export function createChatbotHandler(opts: ChatbotHandlerOptions = {}) {
  const respond = opts.respond ?? respondToChatbotRequest;

  return async function handle(req: RouteRequest, res: RouteResponse): Promise<void> {
    res.setHeader("Cache-Control", "no-store");
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      return res.status(405).json({ error: "Method not allowed" });
    }

    // Abandon in-flight upstream calls if the caller disconnects first.
    const ac = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) ac.abort();
    });

    try {
      const { status, body } = await respond(req.body, opts.env ?? process.env, { signal: ac.signal });
      return res.status(status).json(body);
    } catch (err: unknown) {
      console.error("[chatbot] Unhandled error", err);
      const message = err instanceof Error ? err.message : "chatbot failed";
      return res.status(500).json({ error: message });
    }
  };
}
