/**
 * Memory HTTP controllers.
 *
 * Thin handlers over MemoryService: list, search and clear one user's
 * memories, and report their memory analytics.
 */
import type { MemoryService } from "@domain/memory/MemoryService";
import {
  ListMemoriesQuerySchema,
  SearchMemoriesQuerySchema,
  UserParamsSchema,
} from "@interfaces/http/memory/schema";
import type {
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";

export function listMemoriesController(
  memoryService: MemoryService
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = UserParamsSchema.parse(req.params);
      const { limit } = ListMemoriesQuerySchema.parse(req.query);

      const memories = await memoryService.getUserMemories(userId, limit);

      res.json({ memories, userId, totalCount: memories.length });
    } catch (err: unknown) {
      next(err);
    }
  };
}

export function searchMemoriesController(
  memoryService: MemoryService
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = UserParamsSchema.parse(req.params);
      const { query, limit } = SearchMemoriesQuerySchema.parse(req.query);

      const results = await memoryService.searchMemories(userId, query, limit);

      res.json({ query, userId, results, count: results.length });
    } catch (err: unknown) {
      next(err);
    }
  };
}

export function clearMemoriesController(
  memoryService: MemoryService
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = UserParamsSchema.parse(req.params);

      await memoryService.clearUserMemories(userId);

      res.json({
        status: "success",
        message: `Memories cleared for user ${userId}`,
      });
    } catch (err: unknown) {
      next(err);
    }
  };
}

export function analyticsController(
  memoryService: MemoryService
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = UserParamsSchema.parse(req.params);

      res.json(await memoryService.getUserAnalytics(userId));
    } catch (err: unknown) {
      next(err);
    }
  };
}
