/**
 * OpenAI integration layer.
 *
 * - OpenAI API client construction from config
 * - Retry with backoff for transient failures
 * - ChatCompletionPort implementation over chat completions
 * - Startup check of the configured API key
 */
import type { AppConfig } from "@config/index";
import type {
  ChatCompletionPort,
  CompletionRequest,
} from "@domain/llm/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { errorMessage, InfrastructureError } from "@middleware/errorHandler";
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

export const DEFAULT_BACKOFF_MS: readonly number[] = [0, 200, 500];

/**
 * The slice of the OpenAI client the adapter calls.
 */
export interface CompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<ChatCompletion>;
    };
  };
}

/**
 * The SDK's own retries are turned off; `withRetry` owns the retry budget.
 */
export function createOpenAIClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseUrl,
    timeout: config.openai.timeoutMs,
    maxRetries: 0,
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableError(error: unknown): boolean {
  const retryableCodes = new Set(["ECONNRESET", "ETIMEDOUT"]);
  const retryableStatuses = new Set([429, 500, 502, 503]);

  const candidate =
    error instanceof Error
      ? {
          code: (error as { code?: unknown }).code,
          cause: (error as { cause?: unknown }).cause as
            | { code?: unknown }
            | undefined,
          statusCode: (error as { statusCode?: unknown }).statusCode,
          status: (error as { status?: unknown }).status,
        }
      : {};

  const code = candidate.code ?? candidate.cause?.code;
  if (code && retryableCodes.has(String(code))) {
    return true;
  }

  const status = candidate.statusCode ?? candidate.status;

  return typeof status === "number" && retryableStatuses.has(status);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  backoffDelays: readonly number[] = DEFAULT_BACKOFF_MS
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= backoffDelays.length; attempt += 1) {
    if (attempt > 1) {
      await delay(backoffDelays[attempt - 1] ?? 0);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryableError(e) || attempt === backoffDelays.length) {
        throw e;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt,
        error: errorMessage(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error("LLM operation failed after retries.");
}

export class OpenAIChatAdapter implements ChatCompletionPort {
  constructor(
    private readonly client: CompletionsClient,
    private readonly backoffDelays: readonly number[] = DEFAULT_BACKOFF_MS
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const startedAt = Date.now();

    try {
      const completion = await withRetry(
        () =>
          this.client.chat.completions.create({
            model: request.model,
            messages: request.messages,
            temperature: request.temperature,
            max_tokens: request.maxTokens,
          }),
        "chat.completions.create",
        this.backoffDelays
      );

      const text = completion.choices[0]?.message.content;

      if (!text) {
        throw new InfrastructureError("LLM returned an empty completion", 502, {
          model: request.model,
        });
      }

      logEvent("LLM_SUCCESS", {
        model: request.model,
        durationMs: Date.now() - startedAt,
        messageCount: request.messages.length,
        promptTokens: completion.usage?.prompt_tokens,
        completionTokens: completion.usage?.completion_tokens,
      });

      return text;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: request.model,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
        name: error instanceof Error ? error.name : undefined,
      });

      if (error instanceof InfrastructureError) {
        throw error;
      }

      throw new InfrastructureError(
        `LLM request failed: ${errorMessage(error)}`,
        502,
        { model: request.model }
      );
    }
  }
}

/**
 * Warns about a missing, mocked or malformed key. Never blocks startup.
 */
export function validateOpenAIKey(config: AppConfig): boolean {
  const key = config.openai.apiKey;

  if (!key || key === "mock-key") {
    logger.log(
      "warn",
      "OPENAI_API_KEY not provided or using mock-key. LLM features will fail."
    );
    return false;
  }

  if (!/^sk-[A-Za-z0-9_-]{20,}$/.test(key)) {
    logger.log("warn", "OPENAI_API_KEY format appears invalid.", {
      expected: "sk-...",
    });
    return false;
  }

  logger.log("info", "OPENAI_API_KEY detected & basic format looks valid.");
  return true;
}
