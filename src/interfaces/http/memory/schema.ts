import { z } from "zod";

/**
 * Zod validation schemas for the memory and analytics endpoints.
 */
export const MAX_LIMIT = 100;

function limitWithDefault(defaultLimit: number) {
  return z.coerce.number().int().positive().max(MAX_LIMIT).default(defaultLimit);
}

export const UserParamsSchema = z.object({
  userId: z.string().trim().min(1),
});

export const ListMemoriesQuerySchema = z.object({
  limit: limitWithDefault(10),
});

export const SearchMemoriesQuerySchema = z.object({
  query: z.string().trim().min(1),
  limit: limitWithDefault(5),
});

export const ConversationParamsSchema = UserParamsSchema.extend({
  conversationId: z.string().trim().min(1),
});
