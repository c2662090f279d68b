/**
 * Builds the Express application around already constructed services.
 */
import { errorHandler, notFoundHandler } from "@middleware/errorHandler";
import { registerRoutes, type RouteDependencies } from "@routes/index";
import express, { type Express } from "express";

export function createApp(deps: RouteDependencies): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());

  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
