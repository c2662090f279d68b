/**
 * Memory store interface definitions.
 *
 * Defines the contract the memory service relies on. Every operation is
 * scoped to a single user; fact extraction, embedding and graph relations
 * are the store's concern.
 */
export type MemoryMetadata = Record<string, unknown>;

export type MessageRole = "user" | "assistant";

export interface ConversationMessage {
  role: MessageRole;
  content: string;
}

export interface MemoryRecord {
  id: string;
  memory: string;
  score?: number | undefined;
  createdAt?: string | undefined;
  metadata: MemoryMetadata;
}

export interface AddMemoryOptions {
  userId: string;
  metadata?: MemoryMetadata;
}

export interface SearchMemoryOptions {
  userId: string;
  limit: number;
}

export interface ListMemoryOptions {
  userId: string;
  limit?: number;
}

export interface MemoryStore {
  add(content: string, options: AddMemoryOptions): Promise<MemoryRecord[]>;

  search(query: string, options: SearchMemoryOptions): Promise<MemoryRecord[]>;

  getAll(options: ListMemoryOptions): Promise<MemoryRecord[]>;

  deleteAll(userId: string): Promise<void>;
}
