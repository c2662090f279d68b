/**
 * Main chat orchestration combining memory retrieval and LLM generation.
 *
 * Implements the conversation flow that:
 * - Retrieves the user's memories closest to the incoming message
 * - Generates a memory-aware reply, falling back to a cheaper model
 * - Stores the exchange back into memory under the conversation id
 *
 * Serves as the primary entry point for the /chat endpoint.
 */
import crypto from "crypto";

import type { AppConfig } from "@config/index";
import {
  FALLBACK_SYSTEM_PROMPT,
  memoryAwareSystemPrompt,
  NO_CONVERSATION_FOUND,
  SUMMARY_SYSTEM_PROMPT,
  technicalDifficultiesReply,
} from "@config/prompts";
import { buildMemoryContext } from "@domain/chat/memoryContext";
import type {
  ChatCompletionPort,
  LLMMessage,
  Tracer,
} from "@domain/llm/ports";
import type {
  MemorySearchResult,
  MemoryService,
} from "@domain/memory/MemoryService";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { errorMessage } from "@middleware/errorHandler";

export const SUMMARY_SCAN_LIMIT = 50;
export const SUMMARY_TEMPERATURE = 0.3;

export interface ChatRequest {
  message: string;
  userId: string;
  conversationId?: string | undefined;
}

export interface ChatResponsePayload {
  response: string;
  userId: string;
  conversationId: string;
  memoryAdded: boolean;
  relevantMemoriesCount: number;
  error?: string;
}

export type ChatSettings = AppConfig["chat"] & {
  model: string;
  fallbackModel: string;
};

export function chatSettingsFrom(config: AppConfig): ChatSettings {
  return {
    ...config.chat,
    model: config.openai.model,
    fallbackModel: config.openai.fallbackModel,
  };
}

export class ChatService {
  constructor(
    private readonly memoryService: MemoryService,
    private readonly llm: ChatCompletionPort,
    private readonly tracer: Tracer,
    private readonly settings: ChatSettings
  ) {}

  async processMessage(request: ChatRequest): Promise<ChatResponsePayload> {
    const { message, userId } = request;
    const conversationId = request.conversationId || crypto.randomUUID();

    let memories: MemorySearchResult[];
    try {
      memories = await this.memoryService.searchMemories(
        userId,
        message,
        this.settings.memoryLimit
      );
    } catch (error: unknown) {
      const reason = errorMessage(error);
      logEvent("CHAT_DEGRADED", {
        userId,
        conversationId,
        stage: "search",
        reason,
      });

      return {
        response: await this.generateFallbackResponse(message),
        userId,
        conversationId,
        memoryAdded: false,
        relevantMemoriesCount: 0,
        error: reason,
      };
    }

    const memoryContext = buildMemoryContext(memories);
    const response = await this.generateResponse(
      message,
      memoryContext,
      userId,
      conversationId
    );

    let memoryIds: string[];
    try {
      memoryIds = await this.memoryService.addConversation(
        [
          { role: "user", content: message },
          { role: "assistant", content: response },
        ],
        userId,
        conversationId
      );
    } catch (error: unknown) {
      const reason = errorMessage(error);
      logEvent("CHAT_DEGRADED", {
        userId,
        conversationId,
        stage: "store",
        reason,
      });

      return {
        response,
        userId,
        conversationId,
        memoryAdded: false,
        relevantMemoriesCount: memories.length,
        error: reason,
      };
    }

    logEvent("CHAT_PROCESSED", {
      userId,
      conversationId,
      relevantMemories: memories.length,
      memoriesAdded: memoryIds.length,
    });

    return {
      response,
      userId,
      conversationId,
      memoryAdded: memoryIds.length > 0,
      relevantMemoriesCount: memories.length,
    };
  }

  async getConversationSummary(
    userId: string,
    conversationId: string
  ): Promise<string> {
    const memories = await this.memoryService.getUserMemories(
      userId,
      SUMMARY_SCAN_LIMIT
    );

    const conversationMemories = memories.filter(
      (m) => m.metadata.conversationId === conversationId
    );

    if (conversationMemories.length === 0) {
      return NO_CONVERSATION_FOUND;
    }

    return this.llm.complete({
      model: this.settings.model,
      messages: [
        { role: "system", content: SUMMARY_SYSTEM_PROMPT },
        {
          role: "user",
          content: conversationMemories.map((m) => m.memory).join("\n"),
        },
      ],
      temperature: SUMMARY_TEMPERATURE,
      maxTokens: this.settings.summaryMaxTokens,
    });
  }

  private async generateResponse(
    message: string,
    memoryContext: string,
    userId: string,
    conversationId: string
  ): Promise<string> {
    const messages: LLMMessage[] = [
      { role: "system", content: memoryAwareSystemPrompt(memoryContext) },
      { role: "user", content: message },
    ];
    const startedAt = new Date();

    try {
      const reply = await this.llm.complete({
        model: this.settings.model,
        messages,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
      });

      this.tracer.traceGeneration({
        name: "chat.response",
        userId,
        sessionId: conversationId,
        model: this.settings.model,
        input: messages,
        output: reply,
        startedAt,
        endedAt: new Date(),
      });

      return reply;
    } catch (error: unknown) {
      logger.log("warn", "Primary generation failed, using fallback", {
        userId,
        conversationId,
        error: errorMessage(error),
      });
      return this.generateFallbackResponse(message);
    }
  }

  private async generateFallbackResponse(message: string): Promise<string> {
    try {
      return await this.llm.complete({
        model: this.settings.fallbackModel,
        messages: [
          { role: "system", content: FALLBACK_SYSTEM_PROMPT },
          { role: "user", content: message },
        ],
        temperature: this.settings.temperature,
        maxTokens: this.settings.fallbackMaxTokens,
      });
    } catch (error: unknown) {
      return technicalDifficultiesReply(errorMessage(error));
    }
  }
}
