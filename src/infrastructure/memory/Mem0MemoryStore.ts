/**
 * MemoryStore backed by mem0's open-source Memory (Qdrant + Neo4j).
 */
import type {
  AddMemoryOptions,
  ListMemoryOptions,
  MemoryRecord,
  MemoryStore,
  SearchMemoryOptions,
} from "@domain/memory/ports";
import type { Memory } from "mem0ai/oss";

/**
 * The calls the store makes on mem0's `Memory`.
 */
export type Mem0Client = Pick<
  Memory,
  "add" | "search" | "getAll" | "deleteAll"
>;

type Mem0Item = Awaited<ReturnType<Memory["search"]>>["results"][number];

function toRecord(item: Mem0Item): MemoryRecord {
  return {
    id: item.id,
    memory: item.memory,
    score: item.score,
    createdAt: item.createdAt,
    metadata: item.metadata ?? {},
  };
}

export class Mem0MemoryStore implements MemoryStore {
  constructor(private readonly memory: Mem0Client) {}

  async add(
    content: string,
    options: AddMemoryOptions
  ): Promise<MemoryRecord[]> {
    const result = await this.memory.add(content, {
      userId: options.userId,
      metadata: options.metadata ?? {},
    });
    return result.results.map(toRecord);
  }

  async search(
    query: string,
    options: SearchMemoryOptions
  ): Promise<MemoryRecord[]> {
    const result = await this.memory.search(query, {
      userId: options.userId,
      limit: options.limit,
    });
    return result.results.map(toRecord);
  }

  async getAll(options: ListMemoryOptions): Promise<MemoryRecord[]> {
    const result = await this.memory.getAll({
      userId: options.userId,
      ...(options.limit !== undefined ? { limit: options.limit } : {}),
    });
    return result.results.map(toRecord);
  }

  async deleteAll(userId: string): Promise<void> {
    await this.memory.deleteAll({ userId });
  }
}
