import type { ChatService } from "@app/chat/ChatUseCase";
import {
  chatController,
  conversationSummaryController,
} from "@interfaces/http/ChatController";
import { Router } from "express";

export function createChatRouter(chatService: ChatService): Router {
  const router = Router();

  router.post("/chat", chatController(chatService));
  router.get(
    "/conversations/:userId/:conversationId/summary",
    conversationSummaryController(chatService)
  );

  return router;
}
