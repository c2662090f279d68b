/**
 * Generation tracing through Langfuse, or a no-op when it is not configured.
 */
import type { ObservabilityConfig } from "@config/index";
import type { GenerationTrace, Tracer } from "@domain/llm/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { errorMessage } from "@middleware/errorHandler";
import { Langfuse } from "langfuse";

export class LangfuseTracer implements Tracer {
  private readonly client: Langfuse;

  constructor(config: ObservabilityConfig) {
    this.client = new Langfuse({
      publicKey: config.publicKey,
      secretKey: config.secretKey,
      baseUrl: config.host,
    });
  }

  traceGeneration(trace: GenerationTrace): void {
    try {
      const parent = this.client.trace({
        name: trace.name,
        userId: trace.userId,
        sessionId: trace.sessionId,
        input: trace.input,
        output: trace.output,
        metadata: trace.metadata,
      });

      parent.generation({
        name: trace.name,
        model: trace.model,
        input: trace.input,
        output: trace.output,
        startTime: trace.startedAt,
        endTime: trace.endedAt,
      });
    } catch (error: unknown) {
      logEvent("TRACE_FAILURE", {
        name: trace.name,
        message: errorMessage(error),
      });
    }
  }

  async shutdown(): Promise<void> {
    await this.client.shutdownAsync();
  }
}

export const noopTracer: Tracer = {
  traceGeneration() {},
  async shutdown() {},
};

export function createTracer(config: ObservabilityConfig | undefined): Tracer {
  return config ? new LangfuseTracer(config) : noopTracer;
}
