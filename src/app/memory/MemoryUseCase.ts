/**
 * Memory gateway use-cases.
 *
 * Each operation makes exactly one call against the memory engine and
 * reshapes its reply:
 * - addMemories: passes the conversation through in order, metadata defaulted
 * - searchMemories / listMemories: normalize either reply shape into records
 * - clearMemories: deletes everything stored for one user
 *
 * Readiness is checked first: with an unavailable engine every operation
 * fails with ServiceUnavailableError and the engine is never touched. Any
 * exception from the engine surfaces as EngineFailureError carrying its
 * message. No retries.
 */
import type { EngineState } from "@domain/memory/engineState";
import { normalizeMemories } from "@domain/memory/normalize";
import type { MemoryRecord } from "@domain/memory/normalize";
import type {
  ConversationMessage,
  MemoryEngine,
  MemoryMetadata,
} from "@domain/memory/ports";
import { describeError, logEvent } from "@infrastructure/logging/Logger";
import {
  EngineFailureError,
  ServiceUnavailableError,
} from "@middleware/errorHandler";

export const ENGINE_NOT_INITIALIZED = "Memory engine not initialized";

export interface AddMemoriesInput {
  messages: ConversationMessage[];
  userId: string;
  metadata?: MemoryMetadata | null | undefined;
}

export interface AddMemoriesResult {
  success: true;
  result: unknown;
  message: string;
}

export interface SearchMemoriesInput {
  query: string;
  userId: string;
  limit: number;
}

export interface MemoryListResult {
  success: true;
  count: number;
  memories: MemoryRecord[];
}

export interface ClearMemoriesResult {
  success: true;
  message: string;
}

export class MemoryGateway {
  constructor(private readonly state: EngineState) {}

  isReady(): boolean {
    return this.state.status === "ready";
  }

  assertReady(): MemoryEngine {
    if (this.state.status !== "ready") {
      throw new ServiceUnavailableError(ENGINE_NOT_INITIALIZED, {
        reason: this.state.reason,
      });
    }
    return this.state.engine;
  }

  private async invoke<T>(
    operation: string,
    context: Record<string, unknown>,
    call: (engine: MemoryEngine) => Promise<T>
  ): Promise<T> {
    const engine = this.assertReady();
    const startedAt = Date.now();

    try {
      return await call(engine);
    } catch (error: unknown) {
      const caught = describeError(error);

      logEvent(`${operation}_FAILURE`, {
        ...context,
        durationMs: Date.now() - startedAt,
        message: caught.message,
        name: caught.name,
      });

      throw new EngineFailureError(caught.message, { operation });
    }
  }

  async addMemories(input: AddMemoriesInput): Promise<AddMemoriesResult> {
    const messages = input.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));
    const metadata = input.metadata ?? {};

    logEvent("MEMORY_ADD", {
      userId: input.userId,
      messageCount: messages.length,
    });

    const result = await this.invoke(
      "MEMORY_ADD",
      { userId: input.userId },
      (engine) => engine.extractAndStore(messages, input.userId, metadata)
    );

    logEvent("MEMORY_ADD_SUCCESS", { userId: input.userId });

    return {
      success: true,
      result,
      message: "Memories extracted and stored",
    };
  }

  async searchMemories(input: SearchMemoriesInput): Promise<MemoryListResult> {
    logEvent("MEMORY_SEARCH", {
      userId: input.userId,
      queryLength: input.query.length,
      limit: input.limit,
    });

    const reply = await this.invoke(
      "MEMORY_SEARCH",
      { userId: input.userId },
      (engine) => engine.search(input.query, input.userId, input.limit)
    );

    const memories = normalizeMemories(reply, { withScore: true });

    logEvent("MEMORY_SEARCH_SUCCESS", {
      userId: input.userId,
      count: memories.length,
    });

    return { success: true, count: memories.length, memories };
  }

  async listMemories(userId: string): Promise<MemoryListResult> {
    logEvent("MEMORY_LIST", { userId });

    const reply = await this.invoke("MEMORY_LIST", { userId }, (engine) =>
      engine.listAll(userId)
    );

    const memories = normalizeMemories(reply, { withScore: false });

    logEvent("MEMORY_LIST_SUCCESS", { userId, count: memories.length });

    return { success: true, count: memories.length, memories };
  }

  async clearMemories(userId: string): Promise<ClearMemoriesResult> {
    logEvent("MEMORY_CLEAR", { userId });

    await this.invoke("MEMORY_CLEAR", { userId }, (engine) =>
      engine.deleteAll(userId)
    );

    logEvent("MEMORY_CLEAR_SUCCESS", { userId });

    return { success: true, message: "All memories cleared" };
  }
}
