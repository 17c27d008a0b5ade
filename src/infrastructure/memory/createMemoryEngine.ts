/**
 * Wires the semantic memory engine from configuration: OpenAI client,
 * embedder, fact extractor and the pgvector store. The collection table is
 * created before the engine is handed out; on failure the pool is closed and
 * the error propagates to `initializeEngine`.
 */
import type { AppConfig } from "@config/index";
import type { MemoryEngine } from "@domain/memory/ports";
import { SemanticMemoryEngine } from "@domain/memory/SemanticMemoryEngine";
import { createPool } from "@infrastructure/database/db";
import { PgVectorMemoryStore } from "@infrastructure/database/PgVectorMemoryStore";
import { OpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import {
  createOpenAIClient,
  OpenAIFactExtractor,
} from "@infrastructure/llm/OpenAIAdapter";

export async function createMemoryEngine(
  settings: AppConfig
): Promise<MemoryEngine> {
  const client = createOpenAIClient(settings.openai);
  const pool = createPool(settings.vectorStore);

  try {
    const store = new PgVectorMemoryStore(
      pool,
      settings.vectorStore.collection,
      settings.embedder.dimensions
    );
    await store.ensureCollection();

    return new SemanticMemoryEngine({
      store,
      embedder: new OpenAIEmbeddingProvider(client, settings.embedder),
      extractor: new OpenAIFactExtractor(client, settings.llm),
      similarTopK: settings.memory.similarTopK,
      listLimit: settings.memory.listLimit,
    });
  } catch (error: unknown) {
    await pool.end();
    throw error;
  }
}
