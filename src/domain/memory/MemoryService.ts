/**
 * Memory management for the conversational assistant.
 *
 * Provides user-scoped memory operations on top of a MemoryStore:
 * - Stores single memories and whole conversations with typed metadata
 * - Retrieves memories by semantic similarity or as a plain listing
 * - Clears a user's memories and summarises their memory usage
 *
 * Store failures are logged once and rethrown as InfrastructureError (502).
 */
import type {
  ConversationMessage,
  MemoryMetadata,
  MemoryRecord,
  MemoryStore,
} from "@domain/memory/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { errorMessage, InfrastructureError } from "@middleware/errorHandler";

export const HEALTH_CHECK_USER_ID = "health_check";
export const ANALYTICS_SCAN_LIMIT = 1000;

export interface MemorySearchResult {
  id: string;
  memory: string;
  score: number;
  metadata: MemoryMetadata;
}

export interface UserMemory {
  id: string;
  memory: string;
  createdAt: string | null;
  metadata: MemoryMetadata;
}

export interface UserAnalytics {
  userId: string;
  totalMemories: number;
  conversationMemories: number;
  memoryDistribution: Record<string, number>;
  lastActivity: string | null;
}

export class MemoryService {
  constructor(private readonly store: MemoryStore) {}

  async addMemory(
    content: string,
    userId: string,
    metadata: MemoryMetadata = {}
  ): Promise<string[]> {
    const created = await this.run("add", userId, () =>
      this.store.add(content, {
        userId,
        metadata: { ...metadata, timestamp: new Date().toISOString() },
      })
    );

    return created.map((record) => record.id);
  }

  async addConversation(
    messages: ConversationMessage[],
    userId: string,
    conversationId?: string
  ): Promise<string[]> {
    const ids: string[] = [];

    for (const message of messages) {
      const created = await this.addMemory(
        `${message.role}: ${message.content}`,
        userId,
        {
          type: "conversation",
          role: message.role,
          ...(conversationId ? { conversationId } : {}),
        }
      );
      ids.push(...created);
    }

    return ids;
  }

  async searchMemories(
    userId: string,
    query: string,
    limit = 5
  ): Promise<MemorySearchResult[]> {
    const results = await this.run("search", userId, () =>
      this.store.search(query, { userId, limit })
    );

    return results.map((result) => ({
      id: result.id,
      memory: result.memory,
      score: result.score ?? 0,
      metadata: result.metadata,
    }));
  }

  async getUserMemories(userId: string, limit = 10): Promise<UserMemory[]> {
    const records = await this.run("getAll", userId, () =>
      this.store.getAll({ userId, limit })
    );

    return records.slice(0, limit).map((record) => ({
      id: record.id,
      memory: record.memory,
      createdAt: record.createdAt ?? null,
      metadata: record.metadata,
    }));
  }

  async clearUserMemories(userId: string): Promise<void> {
    await this.run("deleteAll", userId, () => this.store.deleteAll(userId));
  }

  async getUserAnalytics(userId: string): Promise<UserAnalytics> {
    const memories = await this.getUserMemories(userId, ANALYTICS_SCAN_LIMIT);

    const memoryDistribution: Record<string, number> = {};
    for (const memory of memories) {
      const type =
        typeof memory.metadata.type === "string"
          ? memory.metadata.type
          : "general";
      memoryDistribution[type] = (memoryDistribution[type] ?? 0) + 1;
    }

    return {
      userId,
      totalMemories: memories.length,
      conversationMemories: memoryDistribution.conversation ?? 0,
      memoryDistribution,
      lastActivity: memories[0]?.createdAt ?? null,
    };
  }

  /**
   * Probes the store with a one-result search. Never throws.
   */
  async healthCheck(): Promise<string> {
    try {
      await this.store.search("test", {
        userId: HEALTH_CHECK_USER_ID,
        limit: 1,
      });
      return "healthy";
    } catch (error: unknown) {
      return `unhealthy: ${errorMessage(error)}`;
    }
  }

  private async run<T>(
    operation: string,
    userId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const message = errorMessage(error);

      logEvent("MEMORY_FAILURE", { operation, userId, message });

      throw new InfrastructureError(
        `Memory ${operation} failed: ${message}`,
        502,
        { operation }
      );
    }
  }
}
