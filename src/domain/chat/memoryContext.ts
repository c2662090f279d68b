import { NO_MEMORY_CONTEXT } from "@config/prompts";

export interface MemoryLine {
  memory: string;
}

/**
 * One `Memory: <text>` line per retrieved memory, in retrieval order.
 */
export function buildMemoryContext(memories: MemoryLine[]): string {
  if (memories.length === 0) {
    return NO_MEMORY_CONTEXT;
  }

  return memories.map((m) => `Memory: ${m.memory}`).join("\n");
}
