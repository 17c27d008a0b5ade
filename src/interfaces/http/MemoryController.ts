/**
 * Memory HTTP controllers.
 *
 * Express handlers for /add, /search, /all and /clear:
 * - Check engine readiness before anything else
 * - Validate bodies and query strings with Zod
 * - Delegate to the MemoryGateway and send its response
 *
 * Express 5 forwards rejected handler promises to the error middleware.
 */
import type { MemoryGateway } from "@app/memory/MemoryUseCase";
import {
  AddRequestSchema,
  MemoryListResponseSchema,
  SearchRequestSchema,
  UserQuerySchema,
} from "@interfaces/http/memory/schema";
import { AppError, ValidationError } from "@middleware/errorHandler";
import type { Request, RequestHandler, Response } from "express";
import type { z } from "zod";

function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): z.infer<S> {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError("Invalid request", parsed.error.issues);
  }

  return parsed.data;
}

function assertResponse(payload: unknown): void {
  const checked = MemoryListResponseSchema.safeParse(payload);

  if (!checked.success) {
    throw new AppError("Invalid response", "AppError", 500, {
      issues: checked.error.issues,
    });
  }
}

export interface MemoryControllers {
  add: RequestHandler;
  search: RequestHandler;
  listAll: RequestHandler;
  clear: RequestHandler;
}

export function createMemoryControllers(
  gateway: MemoryGateway
): MemoryControllers {
  return {
    async add(req: Request, res: Response): Promise<void> {
      gateway.assertReady();
      const body = parseInput(AddRequestSchema, req.body);

      const result = await gateway.addMemories({
        messages: body.messages,
        userId: body.user_id,
        metadata: body.metadata,
      });

      res.json(result);
    },

    async search(req: Request, res: Response): Promise<void> {
      gateway.assertReady();
      const body = parseInput(SearchRequestSchema, req.body);

      const result = await gateway.searchMemories({
        query: body.query,
        userId: body.user_id,
        limit: body.limit,
      });

      assertResponse(result);
      res.json(result);
    },

    async listAll(req: Request, res: Response): Promise<void> {
      gateway.assertReady();
      const { user_id } = parseInput(UserQuerySchema, req.query);

      const result = await gateway.listMemories(user_id);

      assertResponse(result);
      res.json(result);
    },

    async clear(req: Request, res: Response): Promise<void> {
      gateway.assertReady();
      const { user_id } = parseInput(UserQuerySchema, req.query);

      res.json(await gateway.clearMemories(user_id));
    },
  };
}
