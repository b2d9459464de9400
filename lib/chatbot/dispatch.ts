// lib/chatbot/dispatch.ts
// Primary path: post the trailing message to the workflow and read back the streamed reply.
import { postChatKit, type StepDeps } from "./chatkit";
import { ChatbotError, fail, ok, toChatbotError, type StepResult } from "./errors";
import { previewText } from "./escape";
import { reconstructStream, reconstructText } from "./stream";
import type { ChatMessage } from "./types";

export async function sendMessage(
  clientSecret: string,
  messages: readonly ChatMessage[],
  deps: StepDeps
): Promise<StepResult<string>> {
  const last = messages[messages.length - 1];
  if (!last) {
    return fail(new ChatbotError("InvalidRequest", "Messages array is empty"));
  }
  console.info("[chatbot] Sending message via ChatKit API...");

  try {
    // Authenticated with the session's client secret, not the service key.
    const rsp = await postChatKit(
      "/v1/chatkit/messages",
      clientSecret,
      { content: last.content, role: "user" },
      deps.config.messageTimeoutMs,
      deps
    );

    if (!rsp.ok) {
      const text = await rsp.text().catch(() => "");
      console.error(`[chatbot] ChatKit message API failed: ${rsp.status} - ${previewText(text)}`);
      return fail(
        new ChatbotError("ProtocolError", `ChatKit message API failed: ${rsp.status}`, { status: rsp.status })
      );
    }

    const content = rsp.body ? await reconstructStream(rsp.body) : reconstructText("");
    console.info("[chatbot] Response received via ChatKit workflow");
    return ok(content);
  } catch (err) {
    return fail(toChatbotError(err, "ChatKit message"));
  }
}
