/**
 * Centralized configuration management for the memory-aware assistant.
 *
 * Provides type-safe access to environment variables and application settings:
 * - OpenAI API configuration (chat, fallback and embedding models, timeouts)
 * - mem0 memory configuration (Qdrant vector store, Neo4j graph store)
 * - Optional Langfuse observability keys
 * - Application-level settings (host, port, logging)
 *
 * The entry point builds the config once and passes it to constructors.
 */
export type Env = Record<string, string | undefined>;

export const APP_INFO = {
  name: "Enterprise Memory-Aware AI Assistant",
  version: "1.0.0",
} as const;

export interface ObservabilityConfig {
  provider: "langfuse";
  publicKey: string;
  secretKey: string;
  host: string;
}

export interface AppConfig {
  version: string;

  openai: {
    apiKey: string;
    model: string;
    fallbackModel: string;
    embeddingModel: string;
    baseUrl: string | undefined;
    timeoutMs: number;
  };

  memory: {
    llmModel: string;
    historyDbPath: string;
    vectorStore: {
      url: string;
      collectionName: string;
      dimension: number;
    };
    graphStore: {
      url: string;
      username: string;
      password: string;
    };
  };

  chat: {
    memoryLimit: number;
    temperature: number;
    maxTokens: number;
    fallbackMaxTokens: number;
    summaryMaxTokens: number;
  };

  app: {
    host: string;
    port: number;
  };

  observability: ObservabilityConfig | undefined;

  logging: {
    level: string;
    file: string | undefined;
  };
}

function numberOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function positiveIntOr(value: string | undefined, fallback: number): number {
  const parsed = numberOr(value, fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function nonNegativeOr(value: string | undefined, fallback: number): number {
  const parsed = numberOr(value, fallback);
  return parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.OPENAI_API_KEY;

  if (!apiKey) {
    throw new Error(
      "OPENAI_API_KEY is missing. Please set it in your .env file."
    );
  }

  const debug = (env.DEBUG ?? "false").toLowerCase() === "true";

  const langfusePublicKey = env.LANGFUSE_PUBLIC_KEY;
  const langfuseSecretKey = env.LANGFUSE_SECRET_KEY;

  return {
    version: "v1.1",

    openai: {
      apiKey,
      model: env.OPENAI_MODEL || "gpt-4",
      fallbackModel: env.OPENAI_FALLBACK_MODEL || "gpt-3.5-turbo",
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
      baseUrl: env.OPENAI_BASE_URL || undefined,
      timeoutMs: positiveIntOr(env.OPENAI_TIMEOUT_MS, 30000),
    },

    memory: {
      llmModel: env.MEMORY_LLM_MODEL || "gpt-4",
      historyDbPath: env.MEM0_HISTORY_DB_PATH || "./.mem0/history.db",
      vectorStore: {
        url: env.QDRANT_URL || "http://localhost:6333",
        collectionName: env.QDRANT_COLLECTION || "memory_vectors",
        dimension: positiveIntOr(env.QDRANT_EMBEDDING_DIMS, 1536),
      },
      graphStore: {
        url: env.NEO4J_URL || "bolt://localhost:7687",
        username: env.NEO4J_USERNAME || "neo4j",
        password: env.NEO4J_PASSWORD || "password",
      },
    },

    chat: {
      memoryLimit: positiveIntOr(env.CHAT_MEMORY_LIMIT, 5),
      temperature: nonNegativeOr(env.CHAT_TEMPERATURE, 0.7),
      maxTokens: positiveIntOr(env.CHAT_MAX_TOKENS, 1000),
      fallbackMaxTokens: positiveIntOr(env.FALLBACK_MAX_TOKENS, 500),
      summaryMaxTokens: positiveIntOr(env.SUMMARY_MAX_TOKENS, 200),
    },

    app: {
      host: env.APP_HOST || "0.0.0.0",
      port: positiveIntOr(env.APP_PORT, 8000),
    },

    observability:
      langfusePublicKey && langfuseSecretKey
        ? {
            provider: "langfuse",
            publicKey: langfusePublicKey,
            secretKey: langfuseSecretKey,
            host: env.LANGFUSE_HOST || "https://cloud.langfuse.com",
          }
        : undefined,

    logging: {
      level: env.LOG_LEVEL || (debug ? "debug" : "info"),
      file: env.LOG_FILE || undefined,
    },
  };
}

const REQUIRED_PATHS = [
  "openai.apiKey",
  "memory.vectorStore.url",
  "memory.graphStore.url",
] as const;

function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;

  for (const key of path.split(".")) {
    if (!current || typeof current !== "object" || !(key in current)) {
      return undefined;
    }
    current = (current as Record<string, unknown>)[key];
  }

  return current;
}

/**
 * Returns the required config paths that are missing or empty.
 */
export function validateConfig(config: AppConfig): string[] {
  return REQUIRED_PATHS.filter((path) => !readPath(config, path));
}
