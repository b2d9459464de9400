// pages/api/chatbot/message.ts
import type { NextApiRequest, NextApiResponse } from "next";
import { createChatbotHandler } from "../../../lib/chatbot/handler";

const handle = createChatbotHandler();

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
  return handle(req, res);
}
