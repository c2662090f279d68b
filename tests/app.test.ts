import type { Server } from "http";

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";

import { ChatService, chatSettingsFrom } from "@app/chat/ChatUseCase";
import { loadConfig } from "@config/index";
import { MemoryService } from "@domain/memory/MemoryService";
import { createApp } from "@interfaces/http/app";

import { FakeChatCompletion, FakeMemoryStore, RecordingTracer } from "./mocks";

// ── Helpers ────────────────────────────────────────────────────────

function listen(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("server has no port"));
        return;
      }
      resolve(`http://127.0.0.1:${address.port}`);
    });
  });
}

const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.string(),
    details: z.unknown(),
  }),
});

const ValidationDetailsSchema = z.object({
  issues: z.array(z.object({ path: z.array(z.union([z.string(), z.number()])) })),
});

function errorOf(body: unknown) {
  return ErrorBodySchema.parse(body).error;
}

// ── Tests ──────────────────────────────────────────────────────────

describe("HTTP API", () => {
  let store: FakeMemoryStore;
  let llm: FakeChatCompletion;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new FakeMemoryStore();
    llm = new FakeChatCompletion();

    const memoryService = new MemoryService(store);
    const chatService = new ChatService(
      memoryService,
      llm,
      new RecordingTracer(),
      chatSettingsFrom(loadConfig({ OPENAI_API_KEY: "test-key" }))
    );

    server = createApp({ chatService, memoryService }).listen(0, "127.0.0.1");
    baseUrl = await listen(server);
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function getJson(path: string, init?: RequestInit) {
    const res = await fetch(`${baseUrl}${path}`, init);
    return { status: res.status, body: await res.json() };
  }

  function postJson(path: string, body: unknown) {
    return getJson(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  describe("GET /", () => {
    it("describes the running service", async () => {
      expect(await getJson("/")).toEqual({
        status: 200,
        body: {
          status: "running",
          service: "Enterprise Memory-Aware AI Assistant",
          version: "1.0.0",
        },
      });
    });
  });

  describe("GET /health", () => {
    it("is healthy when the memory store answers", async () => {
      expect(await getJson("/health")).toEqual({
        status: 200,
        body: {
          status: "healthy",
          services: { memory: "healthy", api: "running" },
        },
      });
    });

    it("returns 503 when the memory store fails", async () => {
      store.failOn("search", "qdrant down");

      expect(await getJson("/health")).toEqual({
        status: 503,
        body: {
          error: {
            message: "Service unhealthy: unhealthy: qdrant down",
            code: "InfrastructureError",
            details: {
              services: { memory: "unhealthy: qdrant down", api: "running" },
            },
          },
        },
      });
    });
  });

  describe("POST /chat", () => {
    it("returns the reply and conversation bookkeeping", async () => {
      store.seed("ana", "ana is learning Portuguese");
      llm.enqueue("Olá, Ana!");

      const { status, body } = await postJson("/chat", {
        message: "Portuguese",
        userId: "ana",
        conversationId: "conv-1",
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        response: "Olá, Ana!",
        userId: "ana",
        conversationId: "conv-1",
        memoryAdded: true,
        relevantMemoriesCount: 1,
      });
    });

    it("rejects a body without a message", async () => {
      const { status, body } = await postJson("/chat", { userId: "ana" });

      expect(status).toBe(400);
      const error = errorOf(body);
      expect(error.code).toBe("ValidationError");
      expect(error.message).toBe("Invalid request");
      const { issues } = ValidationDetailsSchema.parse(error.details);
      expect(issues[0]?.path).toEqual(["message"]);
    });

    it("rejects malformed JSON", async () => {
      const { status, body } = await getJson("/chat", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: "{not json",
      });

      expect(status).toBe(400);
      expect(errorOf(body).code).toBe("ValidationError");
    });
  });

  describe("GET /memory/:userId", () => {
    it("lists the user's memories up to the limit", async () => {
      store.seed("ana", "first", { type: "fact" });
      store.seed("ana", "second");

      expect(await getJson("/memory/ana?limit=1")).toEqual({
        status: 200,
        body: {
          memories: [
            {
              id: "mem-1",
              memory: "first",
              createdAt: "2024-01-01T00:00:00.000Z",
              metadata: { type: "fact" },
            },
          ],
          userId: "ana",
          totalCount: 1,
        },
      });
    });

    it("rejects a limit that is not a positive integer", async () => {
      const { status, body } = await getJson("/memory/ana?limit=0");

      expect(status).toBe(400);
      expect(errorOf(body).code).toBe("ValidationError");
    });
  });

  describe("GET /memory/:userId/search", () => {
    it("returns scored matches", async () => {
      store.seed("ana", "ana drinks tea");

      expect(await getJson("/memory/ana/search?query=tea")).toEqual({
        status: 200,
        body: {
          query: "tea",
          userId: "ana",
          results: [
            { id: "mem-1", memory: "ana drinks tea", score: 1, metadata: {} },
          ],
          count: 1,
        },
      });
      expect(store.searchCalls[0]?.limit).toBe(5);
    });

    it("requires a query", async () => {
      const { status } = await getJson("/memory/ana/search");

      expect(status).toBe(400);
    });
  });

  describe("DELETE /memory/:userId", () => {
    it("clears the user's memories", async () => {
      store.seed("ana", "something");

      expect(await getJson("/memory/ana", { method: "DELETE" })).toEqual({
        status: 200,
        body: { status: "success", message: "Memories cleared for user ana" },
      });
      expect(store.forUser("ana")).toHaveLength(0);
    });

    it("reports a store failure as a bad gateway", async () => {
      store.failOn("deleteAll", "neo4j down");

      const { status, body } = await getJson("/memory/ana", {
        method: "DELETE",
      });

      expect(status).toBe(502);
      expect(errorOf(body)).toEqual({
        message: "Memory deleteAll failed: neo4j down",
        code: "InfrastructureError",
        details: { operation: "deleteAll" },
      });
    });
  });

  describe("GET /analytics/:userId", () => {
    it("summarises the user's memory usage", async () => {
      store.seed("ana", "a", { type: "conversation" });
      store.seed("ana", "b");

      expect(await getJson("/analytics/ana")).toEqual({
        status: 200,
        body: {
          userId: "ana",
          totalMemories: 2,
          conversationMemories: 1,
          memoryDistribution: { conversation: 1, general: 1 },
          lastActivity: "2024-01-01T00:00:00.000Z",
        },
      });
    });
  });

  describe("GET /conversations/:userId/:conversationId/summary", () => {
    it("summarises one conversation", async () => {
      store.seed("ana", "user: booked a trip", { conversationId: "c1" });
      llm.enqueue("Ana booked a trip.");

      expect(await getJson("/conversations/ana/c1/summary")).toEqual({
        status: 200,
        body: {
          userId: "ana",
          conversationId: "c1",
          summary: "Ana booked a trip.",
        },
      });
    });
  });

  it("answers unknown routes with 404", async () => {
    const { status, body } = await getJson("/nowhere");

    expect(status).toBe(404);
    expect(errorOf(body)).toEqual({
      message: "Route not found: GET /nowhere",
      code: "DomainError",
      details: { method: "GET", path: "/nowhere" },
    });
  });
});
