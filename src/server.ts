/**
 * Application entry point for the memory-aware assistant.
 *
 * Loads and validates configuration, wires mem0-backed memory, the OpenAI
 * client and optional Langfuse tracing into the services, and starts the
 * Express server.
 */
import "dotenv/config";

import { Memory } from "mem0ai/oss";

import { ChatService, chatSettingsFrom } from "@app/chat/ChatUseCase";
import { APP_INFO, loadConfig, validateConfig } from "@config/index";
import { MemoryService } from "@domain/memory/MemoryService";
import {
  createOpenAIClient,
  OpenAIChatAdapter,
  validateOpenAIKey,
} from "@infrastructure/llm/OpenAIAdapter";
import { configureLogger, logger } from "@infrastructure/logging/Logger";
import { buildMem0Config } from "@infrastructure/memory/mem0Config";
import { Mem0MemoryStore } from "@infrastructure/memory/Mem0MemoryStore";
import { createTracer } from "@infrastructure/observability/LangfuseTracer";
import { createApp } from "@interfaces/http/app";

const config = loadConfig();
configureLogger(config.logging);

const missing = validateConfig(config);
if (missing.length > 0) {
  throw new Error(`Missing required configuration: ${missing.join(", ")}`);
}

validateOpenAIKey(config);

const tracer = createTracer(config.observability);
const memoryService = new MemoryService(
  new Mem0MemoryStore(new Memory(buildMem0Config(config)))
);
const chatService = new ChatService(
  memoryService,
  new OpenAIChatAdapter(createOpenAIClient(config)),
  tracer,
  chatSettingsFrom(config)
);

const app = createApp({ chatService, memoryService });

const server = app.listen(config.app.port, config.app.host, () => {
  logger.log("info", `${APP_INFO.name} v${APP_INFO.version} listening`, {
    host: config.app.host,
    port: config.app.port,
    model: config.openai.model,
    tracing: config.observability ? "langfuse" : "disabled",
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.log("info", "Shutting down", { signal });

  await new Promise<void>((resolve) => server.close(() => resolve()));

  try {
    await tracer.shutdown();
  } catch (err: unknown) {
    logger.log("error", "Tracer shutdown failed", { error: String(err) });
  }

  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
