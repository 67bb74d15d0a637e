import { Request, Response } from "express";
import { ChatbotError } from "../errors";
import type { ChatService } from "../services/chat.service";
import { createLogger } from "../utils/logger";

const log = createLogger("ChatController");

function sendError(res: Response, error: unknown, action: string) {
  if (error instanceof ChatbotError) {
    log.warn(`${action} failed`, { code: error.code, error: error.message });
    return res.status(error.status).json({
      message: error.message,
      error: error.code,
    });
  }

  log.error(`${action} failed`, {
    error: error instanceof Error ? error.stack ?? error.message : String(error),
  });
  return res.status(500).json({
    message: "Internal server error",
    error: error instanceof Error ? error.message : String(error),
  });
}

export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  sendMessage = async (req: Request, res: Response) => {
    try {
      const { sessionId } = req.params;
      const { message } = req.body ?? {};

      if (typeof message !== "string") {
        return res.status(400).json({
          message: "Bad request",
          error: "Message is required in request body",
        });
      }

      const result = await this.chatService.chat(sessionId, message);
      return res.status(200).json(result);
    } catch (error) {
      return sendError(res, error, "chat");
    }
  };

  getState = (req: Request, res: Response) => {
    const { sessionId } = req.params;
    return res.status(200).json(this.chatService.getState(sessionId));
  };

  formatRecipe = async (req: Request, res: Response) => {
    try {
      const { sessionId } = req.params;
      const recipe = await this.chatService.formatCurrentRecipe(sessionId);
      return res.status(200).json(recipe);
    } catch (error) {
      return sendError(res, error, "formatRecipe");
    }
  };

  resetSession = (req: Request, res: Response) => {
    const { sessionId } = req.params;
    this.chatService.reset(sessionId);
    return res.status(204).end();
  };
}
