/**
 * Maps application config onto mem0's open-source Memory configuration.
 *
 * - Embedder: OpenAI embeddings, also used for the Qdrant collection
 * - LLM: OpenAI model that extracts facts and graph relations from text
 * - Vector store: Qdrant collection holding the memory embeddings
 * - Graph store: Neo4j holding entities and relations between them
 * - History: local SQLite file recording memory operations
 */
import type { AppConfig } from "@config/index";
import type { Memory } from "mem0ai/oss";

export type Mem0Config = NonNullable<ConstructorParameters<typeof Memory>[0]>;

export function buildMem0Config(config: AppConfig): Mem0Config {
  return {
    version: config.version,
    embedder: {
      provider: "openai",
      config: {
        apiKey: config.openai.apiKey,
        model: config.openai.embeddingModel,
      },
    },
    llm: {
      provider: "openai",
      config: {
        apiKey: config.openai.apiKey,
        model: config.memory.llmModel,
      },
    },
    vectorStore: {
      provider: "qdrant",
      config: {
        url: config.memory.vectorStore.url,
        collectionName: config.memory.vectorStore.collectionName,
        dimension: config.memory.vectorStore.dimension,
      },
    },
    enableGraph: true,
    graphStore: {
      provider: "neo4j",
      config: {
        url: config.memory.graphStore.url,
        username: config.memory.graphStore.username,
        password: config.memory.graphStore.password,
      },
    },
    historyDbPath: config.memory.historyDbPath,
  };
}
