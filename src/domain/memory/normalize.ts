/**
 * Boundary normalization of loosely-typed engine replies.
 *
 * Search and list replies arrive either as `{ results: [...] }` or as a bare
 * array. They are classified once here and turned into `MemoryRecord`s; the
 * union never travels further into the gateway.
 */

export type EngineReply =
  | { kind: "mapping"; results: unknown[] }
  | { kind: "sequence"; results: unknown[] }
  | { kind: "other" };

export interface MemoryRecord {
  id: string;
  memory: string;
  score?: number;
  metadata: Record<string, unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function classifyReply(reply: unknown): EngineReply {
  if (Array.isArray(reply)) {
    return { kind: "sequence", results: reply };
  }

  if (isPlainObject(reply) && Array.isArray(reply.results)) {
    return { kind: "mapping", results: reply.results };
  }

  return { kind: "other" };
}

export function replyEntries(reply: unknown): unknown[] {
  const classified = classifyReply(reply);
  return classified.kind === "other" ? [] : classified.results;
}

function toText(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  return JSON.stringify(value);
}

function toScore(value: unknown): number {
  if (typeof value !== "number" && typeof value !== "string") {
    return 0;
  }
  if (typeof value === "string" && value.trim() === "") {
    return 0;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toMetadata(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

export function toMemoryRecord(
  entry: Record<string, unknown>,
  options: { withScore: boolean }
): MemoryRecord {
  const record: MemoryRecord = {
    id: toText(entry.id),
    memory: toText(entry.memory),
    metadata: toMetadata(entry.metadata),
  };

  if (options.withScore) {
    return {
      id: record.id,
      memory: record.memory,
      score: toScore(entry.score),
      metadata: record.metadata,
    };
  }

  return record;
}

/**
 * Turns any engine reply into records. Entries that are not objects are
 * dropped, so `count` always equals the number of records returned.
 */
export function normalizeMemories(
  reply: unknown,
  options: { withScore: boolean }
): MemoryRecord[] {
  return replyEntries(reply)
    .filter(isPlainObject)
    .map((entry) => toMemoryRecord(entry, options));
}
