/**
 * Domain ports for LLM interactions and generation tracing.
 *
 * The chat service builds every prompt itself and depends only on a single
 * text-completion call; the OpenAI implementation lives in
 * infrastructure/llm/OpenAIAdapter.ts.
 */
export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
}

export interface ChatCompletionPort {
  complete(request: CompletionRequest): Promise<string>;
}

export interface GenerationTrace {
  name: string;
  userId: string;
  sessionId?: string;
  model: string;
  input: LLMMessage[];
  output: string;
  startedAt: Date;
  endedAt: Date;
  metadata?: Record<string, unknown>;
}

export interface Tracer {
  traceGeneration(trace: GenerationTrace): void;
  shutdown(): Promise<void>;
}
