/**
 * OpenAI embedding provider for memory texts and search queries.
 *
 * Single-text and batch embedding with a fixed model and dimension count,
 * so every vector matches the collection's `vector(N)` column.
 */
import type { AppConfig } from "@config/index";
import type { EmbeddingPort } from "@domain/memory/ports";
import { describeError, logEvent } from "@infrastructure/logging/Logger";
import type { EmbeddingCreateParams } from "openai/resources/embeddings";

/** The part of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

export class OpenAIEmbeddingProvider implements EmbeddingPort {
  constructor(
    private readonly client: EmbeddingsClient,
    private readonly settings: AppConfig["embedder"]
  ) {}

  async embed(text: string): Promise<number[]> {
    const normalized = text.trim();

    if (!normalized) {
      throw new Error("Cannot embed empty text");
    }

    const [vector] = await this.embedBatch([normalized]);

    if (!vector) {
      throw new Error("Embedding API returned invalid data");
    }

    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const normalized = texts.map((t) => t.trim());

    if (normalized.length === 0) {
      return [];
    }

    if (normalized.some((t) => t.length === 0)) {
      throw new Error("Cannot embed empty text");
    }

    const startedAt = Date.now();

    try {
      const response = await this.client.embeddings.create({
        model: this.settings.model,
        input: normalized,
        dimensions: this.settings.dimensions,
      });

      if (response.data.length !== normalized.length) {
        throw new Error(
          `Embedding API returned ${response.data.length} vectors for ${normalized.length} inputs`
        );
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.settings.model,
        durationMs: Date.now() - startedAt,
        batchSize: normalized.length,
        vectorLength: response.data[0]?.embedding.length ?? 0,
      });

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error: unknown) {
      const caught = describeError(error);

      logEvent("EMBEDDING_FAILURE", {
        model: this.settings.model,
        durationMs: Date.now() - startedAt,
        batchSize: normalized.length,
        message: caught.message,
        name: caught.name,
      });

      throw error;
    }
  }
}
