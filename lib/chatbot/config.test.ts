import { describe, expect, it } from "vitest";
import { DEFAULT_SYSTEM_PROMPT, loadChatbotConfig } from "./config";

describe("loadChatbotConfig", () => {
  it("applies defaults around the required values", () => {
    const r = loadChatbotConfig({ OPENAI_API_KEY: "test-key", CHATKIT_WORKFLOW_ID: "wf_test" });
    expect(r).toEqual({
      ok: true,
      value: {
        apiKey: "test-key",
        workflowId: "wf_test",
        chatkitBase: "https://api.openai.com",
        openaiBase: "https://api.openai.com/v1",
        fallbackModel: "gpt-4o-mini",
        sessionTimeoutMs: 30_000,
        messageTimeoutMs: 60_000,
        fallbackTimeoutMs: 60_000,
        systemPrompt: DEFAULT_SYSTEM_PROMPT,
      },
    });
  });

  it("reads overrides and the legacy key name", () => {
    const r = loadChatbotConfig({
      OPENAI_APIKEY: "legacy-key",
      CHATKIT_WORKFLOW_ID: "wf_test",
      CHATKIT_API_BASE: "https://chatkit.test/",
      CHATBOT_FALLBACK_MODEL: "gpt-4o",
      CHATBOT_SESSION_TIMEOUT_MS: "5000",
      CHATBOT_MESSAGE_TIMEOUT_MS: "-1",
      CHATBOT_FALLBACK_TIMEOUT_MS: "soon",
      CHATBOT_SYSTEM_PROMPT: "Be brief.",
    });
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.value).toMatchObject({
      apiKey: "legacy-key",
      chatkitBase: "https://chatkit.test",
      fallbackModel: "gpt-4o",
      sessionTimeoutMs: 5000,
      messageTimeoutMs: 60_000,
      fallbackTimeoutMs: 60_000,
      systemPrompt: "Be brief.",
    });
  });

  it("reports Unconfigured when the key is missing", () => {
    const r = loadChatbotConfig({ CHATKIT_WORKFLOW_ID: "wf_test", OPENAI_API_KEY: "  " });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe("Unconfigured");
    expect(r.error.message).toBe("OpenAI API key not configured");
  });
});
