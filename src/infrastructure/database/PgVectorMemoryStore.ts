import type {
  MemoryVectorStore,
  NewMemory,
  ScoredMemory,
  StoredMemory,
} from "@domain/memory/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { z } from "zod";

/**
 * The subset of `pg.Pool` the store needs.
 */
export interface SqlExecutor {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const MemoryRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  memory: z.string(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date().nullable(),
});

const ScoredRowSchema = MemoryRowSchema.extend({
  score: z.coerce.number(),
});

type MemoryRow = z.infer<typeof MemoryRowSchema>;

function toStoredMemory(row: MemoryRow): StoredMemory {
  return {
    id: row.id,
    userId: row.user_id,
    memory: row.memory,
    metadata: row.metadata ?? {},
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toPgVectorLiteral(vector: number[]): string {
  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

/**
 * Postgres + pgvector implementation of the MemoryVectorStore port.
 *
 * One table per collection. Every statement is scoped by `user_id`;
 * similarity is cosine (`score = 1 - (embedding <=> query)`).
 */
export class PgVectorMemoryStore implements MemoryVectorStore {
  private readonly table: string;

  constructor(
    private readonly db: SqlExecutor,
    collection: string,
    private readonly dimensions: number
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(collection)) {
      throw new Error(`Invalid collection name "${collection}"`);
    }
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Invalid embedding dimensions ${dimensions}`);
    }
    this.table = collection;
  }

  async ensureCollection(): Promise<void> {
    await this.db.query("CREATE EXTENSION IF NOT EXISTS vector;");
    await this.db.query(
      `
      CREATE TABLE IF NOT EXISTS "${this.table}" (
        id UUID PRIMARY KEY,
        user_id TEXT NOT NULL,
        memory TEXT NOT NULL,
        embedding vector(${this.dimensions}) NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ
      );
      `
    );
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS "${this.table}_user_id_idx" ON "${this.table}" (user_id);`
    );

    logEvent("VECTOR_COLLECTION_READY", {
      collection: this.table,
      dimensions: this.dimensions,
    });
  }

  async insert(entry: NewMemory): Promise<void> {
    await this.db.query(
      `
      INSERT INTO "${this.table}" (id, user_id, memory, embedding, metadata)
      VALUES ($1, $2, $3, $4::vector, $5::jsonb);
      `,
      [
        entry.id,
        entry.userId,
        entry.memory,
        toPgVectorLiteral(entry.embedding),
        JSON.stringify(entry.metadata),
      ]
    );
  }

  async update(
    id: string,
    userId: string,
    memory: string,
    embedding: number[]
  ): Promise<void> {
    await this.db.query(
      `
      UPDATE "${this.table}"
      SET memory = $3, embedding = $4::vector, updated_at = NOW()
      WHERE id = $1 AND user_id = $2;
      `,
      [id, userId, memory, toPgVectorLiteral(embedding)]
    );
  }

  async remove(id: string, userId: string): Promise<void> {
    await this.db.query(
      `DELETE FROM "${this.table}" WHERE id = $1 AND user_id = $2;`,
      [id, userId]
    );
  }

  async search(
    userId: string,
    embedding: number[],
    limit: number
  ): Promise<ScoredMemory[]> {
    const result = await this.db.query(
      `
      SELECT
        id::text AS id,
        user_id,
        memory,
        metadata,
        created_at,
        updated_at,
        1 - (embedding <=> $2::vector) AS score
      FROM "${this.table}"
      WHERE user_id = $1
      ORDER BY embedding <=> $2::vector
      LIMIT $3;
      `,
      [userId, toPgVectorLiteral(embedding), limit]
    );

    return result.rows.map((raw) => {
      const row = ScoredRowSchema.parse(raw);
      return { ...toStoredMemory(row), score: row.score };
    });
  }

  async list(userId: string, limit: number): Promise<StoredMemory[]> {
    const result = await this.db.query(
      `
      SELECT id::text AS id, user_id, memory, metadata, created_at, updated_at
      FROM "${this.table}"
      WHERE user_id = $1
      ORDER BY created_at DESC
      LIMIT $2;
      `,
      [userId, limit]
    );

    return result.rows.map((raw) => toStoredMemory(MemoryRowSchema.parse(raw)));
  }

  async removeAll(userId: string): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM "${this.table}" WHERE user_id = $1;`,
      [userId]
    );

    return result.rowCount ?? 0;
  }
}
