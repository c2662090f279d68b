import type { MemoryService } from "@domain/memory/MemoryService";
import {
  analyticsController,
  clearMemoriesController,
  listMemoriesController,
  searchMemoriesController,
} from "@interfaces/http/MemoryController";
import { Router } from "express";

export function createMemoryRouter(memoryService: MemoryService): Router {
  const router = Router();

  router.get("/memory/:userId", listMemoriesController(memoryService));
  router.delete("/memory/:userId", clearMemoriesController(memoryService));
  router.get(
    "/memory/:userId/search",
    searchMemoriesController(memoryService)
  );
  router.get("/analytics/:userId", analyticsController(memoryService));

  return router;
}
