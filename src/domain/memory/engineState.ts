import { describeError, logger } from "@infrastructure/logging/Logger";

import type { MemoryEngine } from "./ports";

/**
 * Initialization outcome of the memory engine, fixed for the process lifetime.
 */
export type EngineState =
  | { status: "ready"; engine: MemoryEngine }
  | { status: "unavailable"; reason: string };

export function readyState(engine: MemoryEngine): EngineState {
  return { status: "ready", engine };
}

export function unavailableState(reason: string): EngineState {
  return { status: "unavailable", reason };
}

/**
 * Builds the engine once. A failing factory leaves the engine unavailable;
 * there is no retry.
 */
export async function initializeEngine(
  factory: () => Promise<MemoryEngine>
): Promise<EngineState> {
  const startedAt = Date.now();

  try {
    const engine = await factory();

    logger.log("info", "MEMORY_ENGINE_READY", {
      durationMs: Date.now() - startedAt,
    });

    return readyState(engine);
  } catch (error: unknown) {
    const caught = describeError(error);

    logger.log("error", "MEMORY_ENGINE_INIT_FAILED", {
      durationMs: Date.now() - startedAt,
      message: caught.message,
      name: caught.name,
    });

    return unavailableState(caught.message);
  }
}
