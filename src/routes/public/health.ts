/**
 * Service status routes.
 *
 * - GET /: service name and version
 * - GET /health: probes the memory store; 503 when it is unhealthy
 */
import { APP_INFO } from "@config/index";
import type { MemoryService } from "@domain/memory/MemoryService";
import { InfrastructureError } from "@middleware/errorHandler";
import { Router } from "express";

export function createHealthRouter(memoryService: MemoryService): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      status: "running",
      service: APP_INFO.name,
      version: APP_INFO.version,
    });
  });

  router.get("/health", async (_req, res, next) => {
    const memory = await memoryService.healthCheck();

    if (memory !== "healthy") {
      return next(
        new InfrastructureError(`Service unhealthy: ${memory}`, 503, {
          services: { memory, api: "running" },
        })
      );
    }

    res.json({
      status: "healthy",
      services: { memory, api: "running" },
    });
  });

  return router;
}
