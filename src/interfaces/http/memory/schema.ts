import { DEFAULT_SEARCH_LIMIT, DEFAULT_USER_ID } from "@config/service";
import { z } from "zod";

/**
 * Zod schemas for the memory endpoints.
 *
 * Request DTOs use the snake_case field names of the public API; response
 * schemas check what controllers send back.
 */
export const ConversationMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
});

export const AddRequestSchema = z.object({
  messages: z.array(ConversationMessageSchema),
  user_id: z.string().default(DEFAULT_USER_ID),
  metadata: z.record(z.unknown()).nullish(),
});

/** Integer, or a string holding one (`"3"`); `"3.5"` and `"three"` fail. */
const IntegerSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^[+-]?\d+$/, "Expected an integer")
    .transform(Number),
]);

export const SearchRequestSchema = z.object({
  query: z.string(),
  user_id: z.string().default(DEFAULT_USER_ID),
  limit: IntegerSchema.default(DEFAULT_SEARCH_LIMIT),
});

export const UserQuerySchema = z.object({
  user_id: z.string().default(DEFAULT_USER_ID),
});

const MemoryRecordSchema = z.object({
  id: z.string(),
  memory: z.string(),
  score: z.number().optional(),
  metadata: z.record(z.unknown()),
});

export const MemoryListResponseSchema = z.object({
  success: z.literal(true),
  count: z.number().int().nonnegative(),
  memories: z.array(MemoryRecordSchema),
});
