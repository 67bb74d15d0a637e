import { Router } from "express";
import { ChatController } from "./controller.ts/chat.controller";
import type { ChatService } from "./services/chat.service";

export function createMainRouter(chatService: ChatService): Router {
  const mainRouter = Router();
  const chat = new ChatController(chatService);

  mainRouter.get("/health", (req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      sessions: chatService.sessionCount,
    });
  });

  mainRouter.post("/sessions/:sessionId/messages", chat.sendMessage);

  mainRouter.get("/sessions/:sessionId/state", chat.getState);

  // Structured JSON card for the session's current recipe
  mainRouter.post("/sessions/:sessionId/recipe/format", chat.formatRecipe);

  mainRouter.delete("/sessions/:sessionId", chat.resetSession);

  return mainRouter;
}
