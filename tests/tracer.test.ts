import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import type { GenerationTrace } from "@domain/llm/ports";
import { logger } from "@infrastructure/logging/Logger";
import {
  createTracer,
  LangfuseTracer,
  noopTracer,
} from "@infrastructure/observability/LangfuseTracer";

const langfuse = vi.hoisted(() => {
  const generation = vi.fn();
  return {
    options: [] as unknown[],
    generation,
    trace: vi.fn(() => ({ generation })),
    shutdownAsync: vi.fn(async () => {}),
  };
});

vi.mock("langfuse", () => ({
  Langfuse: class {
    trace = langfuse.trace;
    shutdownAsync = langfuse.shutdownAsync;

    constructor(options: unknown) {
      langfuse.options.push(options);
    }
  },
}));

const observability = {
  provider: "langfuse",
  publicKey: "pk-test",
  secretKey: "sk-test",
  host: "http://langfuse.local",
} as const;

const startedAt = new Date("2024-01-01T00:00:00.000Z");
const endedAt = new Date("2024-01-01T00:00:01.500Z");

const generation: GenerationTrace = {
  name: "chat.response",
  userId: "ana",
  sessionId: "conv-1",
  model: "gpt-4",
  input: [{ role: "user", content: "hi" }],
  output: "hello",
  startedAt,
  endedAt,
  metadata: { relevantMemories: 2 },
};

describe("createTracer", () => {
  it("does nothing when Langfuse is not configured", async () => {
    const tracer = createTracer(undefined);

    expect(tracer).toBe(noopTracer);
    expect(() => tracer.traceGeneration(generation)).not.toThrow();
    await expect(tracer.shutdown()).resolves.toBeUndefined();
  });

  it("uses Langfuse when both keys are configured", () => {
    expect(createTracer(observability)).toBeInstanceOf(LangfuseTracer);
  });
});

describe("LangfuseTracer", () => {
  beforeEach(() => {
    langfuse.options.length = 0;
    langfuse.trace.mockClear();
    langfuse.generation.mockClear();
    langfuse.shutdownAsync.mockClear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("connects with the configured keys and host", () => {
    new LangfuseTracer(observability);

    expect(langfuse.options).toEqual([
      {
        publicKey: "pk-test",
        secretKey: "sk-test",
        baseUrl: "http://langfuse.local",
      },
    ]);
  });

  it("records a trace for the conversation with one generation", () => {
    new LangfuseTracer(observability).traceGeneration(generation);

    expect(langfuse.trace).toHaveBeenCalledWith({
      name: "chat.response",
      userId: "ana",
      sessionId: "conv-1",
      input: [{ role: "user", content: "hi" }],
      output: "hello",
      metadata: { relevantMemories: 2 },
    });
    expect(langfuse.generation).toHaveBeenCalledWith({
      name: "chat.response",
      model: "gpt-4",
      input: [{ role: "user", content: "hi" }],
      output: "hello",
      startTime: startedAt,
      endTime: endedAt,
    });
  });

  it("logs a tracing failure instead of throwing", () => {
    const event = vi.spyOn(logger, "event");
    langfuse.trace.mockImplementationOnce(() => {
      throw new Error("langfuse unreachable");
    });

    expect(() =>
      new LangfuseTracer(observability).traceGeneration(generation)
    ).not.toThrow();
    expect(event).toHaveBeenCalledWith("TRACE_FAILURE", {
      name: "chat.response",
      message: "langfuse unreachable",
    });
    expect(langfuse.generation).not.toHaveBeenCalled();
  });

  it("flushes pending events on shutdown", async () => {
    await new LangfuseTracer(observability).shutdown();

    expect(langfuse.shutdownAsync).toHaveBeenCalledTimes(1);
  });
});
