/**
 * Express route registration for the assistant API.
 *
 * - Service status and health check
 * - Conversational chat endpoint with memory and context
 * - Per-user memory listing, search, deletion and analytics
 */
import type { ChatService } from "@app/chat/ChatUseCase";
import type { MemoryService } from "@domain/memory/MemoryService";
import { createChatRouter } from "@routes/public/chat";
import { createHealthRouter } from "@routes/public/health";
import { createMemoryRouter } from "@routes/public/memory";
import type { Express } from "express";

export interface RouteDependencies {
  chatService: ChatService;
  memoryService: MemoryService;
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  app.use(createHealthRouter(deps.memoryService));
  app.use(createChatRouter(deps.chatService));
  app.use(createMemoryRouter(deps.memoryService));
}
