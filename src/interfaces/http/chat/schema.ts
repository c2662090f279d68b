import { z } from "zod";

/**
 * Zod validation schemas for the chat endpoint.
 *
 * - ChatRequestSchema: a non-empty message for a user, optionally inside an
 *   existing conversation
 * - ChatResponseSchema: the reply and what happened to memory on the way
 */
export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
  userId: z.string().trim().min(1),
  conversationId: z.string().trim().min(1).optional(),
});

export const ChatResponseSchema = z.object({
  response: z.string(),
  userId: z.string(),
  conversationId: z.string(),
  memoryAdded: z.boolean(),
  relevantMemoriesCount: z.number().int().nonnegative(),
  error: z.string().optional(),
});

