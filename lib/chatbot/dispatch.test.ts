import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { sendMessage } from "./dispatch";
import { EMPTY_REPLY } from "./stream";
import {
  HELLO_STREAM,
  MESSAGES_URL,
  bodyOf,
  eventStream,
  fakeFetch,
  hangUntilAborted,
  headerOf,
  json,
  testConfig,
} from "./testUtils";
import type { ChatMessage } from "./types";

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

const conversation: ChatMessage[] = [
  { role: "user", content: "Is Lisbon good for short-term rentals?" },
  { role: "assistant", content: "It depends on the licence zone." },
  { role: "user", content: "What about Porto?" },
];

describe("sendMessage", () => {
  it("sends only the trailing message, authenticated with the client secret", async () => {
    const up = fakeFetch({ [MESSAGES_URL]: () => eventStream(HELLO_STREAM) });

    const r = await sendMessage("cs_abc", conversation, { config: testConfig, fetch: up.fetch });

    expect(r).toEqual({ ok: true, value: "Hello there" });
    expect(up.calls).toHaveLength(1);
    expect(bodyOf(up.calls[0])).toEqual({ content: "What about Porto?", role: "user" });
    expect(headerOf(up.calls[0], "authorization")).toBe("Bearer cs_abc");
    expect(headerOf(up.calls[0], "openai-beta")).toBe("chatkit_beta=v1");
  });

  it("rejects an empty sequence without calling out", async () => {
    const up = fakeFetch({});

    const r = await sendMessage("cs_abc", [], { config: testConfig, fetch: up.fetch });

    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("InvalidRequest");
    expect(up.calls).toHaveLength(0);
  });

  it("fails with ProtocolError on a non-success status", async () => {
    const up = fakeFetch({ [MESSAGES_URL]: () => json(500, { error: "boom" }) });

    const r = await sendMessage("cs_abc", conversation, { config: testConfig, fetch: up.fetch });

    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("ProtocolError");
    expect(r.error.status).toBe(500);
    expect(r.error.message).toBe("ChatKit message API failed: 500");
  });

  it("returns the placeholder for a successful but empty stream", async () => {
    const up = fakeFetch({ [MESSAGES_URL]: () => eventStream("data: [DONE]\n") });

    const r = await sendMessage("cs_abc", conversation, { config: testConfig, fetch: up.fetch });

    expect(r).toEqual({ ok: true, value: EMPTY_REPLY });
  });

  it("fails with UpstreamTimeout when the call outlives its timeout", async () => {
    const up = fakeFetch({ [MESSAGES_URL]: hangUntilAborted });

    const r = await sendMessage("cs_abc", conversation, {
      config: { ...testConfig, messageTimeoutMs: 5 },
      fetch: up.fetch,
    });

    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("UpstreamTimeout");
    expect(r.error.message).toBe("ChatKit message timed out");
  });
});
