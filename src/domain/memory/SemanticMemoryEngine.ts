/**
 * Semantic memory engine behind the gateway.
 *
 * Ingestion runs in two LLM steps: extract facts from the conversation, then
 * reconcile them with the user's nearest existing memories (ADD / UPDATE /
 * DELETE / NONE). Existing memories are shown to the LLM under short integer
 * aliases so it can only ever reference rows that were actually retrieved.
 *
 * Retrieval is plain cosine similarity over the user's memories.
 */
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { v4 as uuidv4 } from "uuid";

import type {
  ConversationMessage,
  EmbeddingPort,
  FactExtractorPort,
  MemoryAction,
  MemoryEngine,
  MemoryEvent,
  MemoryMetadata,
  MemoryVectorStore,
  StoredMemory,
} from "./ports";

export interface SemanticMemoryEngineOptions {
  store: MemoryVectorStore;
  embedder: EmbeddingPort;
  extractor: FactExtractorPort;
  /** Existing memories fetched per new fact for reconciliation. */
  similarTopK: number;
  /** Cap on `listAll`. */
  listLimit: number;
  newId?: () => string;
}

export interface IngestedMemory {
  id: string;
  memory: string;
  event: Exclude<MemoryEvent, "NONE">;
  previous_memory?: string;
}

export interface EngineMemoryEntry {
  id: string;
  memory: string;
  user_id: string;
  metadata: MemoryMetadata;
  created_at: string;
  updated_at: string | null;
  score?: number;
}

function toEntry(memory: StoredMemory, score?: number): EngineMemoryEntry {
  const entry: EngineMemoryEntry = {
    id: memory.id,
    memory: memory.memory,
    user_id: memory.userId,
    metadata: memory.metadata,
    created_at: memory.createdAt.toISOString(),
    updated_at: memory.updatedAt ? memory.updatedAt.toISOString() : null,
  };

  if (score !== undefined) {
    entry.score = score;
  }

  return entry;
}

export class SemanticMemoryEngine implements MemoryEngine {
  private readonly newId: () => string;

  constructor(private readonly options: SemanticMemoryEngineOptions) {
    this.newId = options.newId ?? (() => uuidv4());
  }

  async extractAndStore(
    messages: ConversationMessage[],
    userId: string,
    metadata: MemoryMetadata
  ): Promise<{ results: IngestedMemory[] }> {
    const { store, embedder, extractor, similarTopK } = this.options;

    const facts = await extractor.extractFacts(messages);

    if (facts.length === 0) {
      logEvent("MEMORY_NO_FACTS", { userId, messageCount: messages.length });
      return { results: [] };
    }

    const vectors = await embedder.embedBatch(facts);
    const vectorByText = new Map<string, number[]>();
    facts.forEach((fact, i) => {
      const vector = vectors[i];
      if (vector) {
        vectorByText.set(fact, vector);
      }
    });

    const existingById = new Map<string, StoredMemory>();
    for (const vector of vectors) {
      const similar = await store.search(userId, vector, similarTopK);
      for (const memory of similar) {
        existingById.set(memory.id, memory);
      }
    }

    const existing = [...existingById.values()];
    const actions: MemoryAction[] =
      existing.length === 0
        ? facts.map(
            (fact): MemoryAction => ({ id: "", text: fact, event: "ADD" })
          )
        : await extractor.reconcile(
            existing.map((m, i) => ({ id: String(i), text: m.memory })),
            facts
          );

    const embedText = async (text: string): Promise<number[]> =>
      vectorByText.get(text) ?? embedder.embed(text);

    const results: IngestedMemory[] = [];

    for (const action of actions) {
      if (action.event === "NONE") {
        continue;
      }

      if (action.event === "ADD") {
        if (!action.text) {
          continue;
        }
        const id = this.newId();
        await store.insert({
          id,
          userId,
          memory: action.text,
          embedding: await embedText(action.text),
          metadata,
        });
        results.push({ id, memory: action.text, event: "ADD" });
        continue;
      }

      const target = /^\d+$/.test(action.id)
        ? existing[Number(action.id)]
        : undefined;

      if (!target) {
        logger.log("warn", "MEMORY_ACTION_UNKNOWN_ID", {
          userId,
          event: action.event,
          alias: action.id,
        });
        continue;
      }

      if (action.event === "UPDATE") {
        if (!action.text) {
          continue;
        }
        await store.update(
          target.id,
          userId,
          action.text,
          await embedText(action.text)
        );
        results.push({
          id: target.id,
          memory: action.text,
          event: "UPDATE",
          previous_memory: target.memory,
        });
        continue;
      }

      await store.remove(target.id, userId);
      results.push({ id: target.id, memory: target.memory, event: "DELETE" });
    }

    logEvent("MEMORY_INGESTED", {
      userId,
      facts: facts.length,
      candidates: existing.length,
      applied: results.length,
    });

    return { results };
  }

  async search(
    query: string,
    userId: string,
    limit: number
  ): Promise<{ results: EngineMemoryEntry[] }> {
    if (limit <= 0) {
      return { results: [] };
    }

    const vector = await this.options.embedder.embed(query);
    const found = await this.options.store.search(userId, vector, limit);

    return { results: found.map((m) => toEntry(m, m.score)) };
  }

  async listAll(userId: string): Promise<{ results: EngineMemoryEntry[] }> {
    const stored = await this.options.store.list(
      userId,
      this.options.listLimit
    );

    return { results: stored.map((m) => toEntry(m)) };
  }

  async deleteAll(userId: string): Promise<void> {
    const removed = await this.options.store.removeAll(userId);
    logEvent("MEMORY_DELETED_ALL", { userId, removed });
  }
}
