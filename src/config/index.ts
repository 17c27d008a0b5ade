/**
 * Centralized configuration for the memory gateway.
 *
 * Loads environment variables once at startup:
 * - OpenAI client settings shared by the embedder and the extraction LLM
 * - Embedding model and vector dimensions
 * - LLM model and generation parameters
 * - PostgreSQL/pgvector connection and collection (table) name
 * - HTTP server settings
 *
 * The process refuses to start without an OpenAI API key.
 */
import dotenv from "dotenv";

dotenv.config();

const openaiKey = process.env.OPENAI_API_KEY;

if (!openaiKey) {
  throw new Error(
    "OPENAI_API_KEY is missing. Please set it in your .env file."
  );
}

const collection = process.env.VECTOR_COLLECTION || "memories";

if (!/^[a-z_][a-z0-9_]{0,62}$/.test(collection)) {
  throw new Error(
    `VECTOR_COLLECTION "${collection}" must be a lowercase SQL identifier.`
  );
}

export const config = {
  env: process.env.NODE_ENV || "development",

  server: {
    host: process.env.HOST || "0.0.0.0",
    port: Number(process.env.PORT || 8420),
    corsOrigin: process.env.CORS_ORIGIN || "*",
    bodyLimit: process.env.BODY_LIMIT || "10mb",
  },

  openai: {
    key: openaiKey,
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    timeoutMs: Number(process.env.OPENAI_TIMEOUT_MS || 30000),
    maxRetries: Number(process.env.OPENAI_MAX_RETRIES || 2),
  },

  embedder: {
    model: process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    dimensions: Number(process.env.OPENAI_EMBEDDING_DIMS || 1536),
  },

  llm: {
    model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    temperature: Number(process.env.LLM_TEMPERATURE || 0.1),
    maxTokens: Number(process.env.LLM_MAX_TOKENS || 2000),
  },

  vectorStore: {
    collection,
    host: process.env.DB_HOST || "localhost",
    port: Number(process.env.DB_PORT || 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: Number(process.env.DB_POOL_MAX || 10),
    idleTimeoutMs: Number(process.env.DB_IDLE_TIMEOUT_MS || 30000),
    connectionTimeoutMs: Number(process.env.DB_CONN_TIMEOUT_MS || 10000),
    statementTimeoutMs: Number(process.env.DB_STATEMENT_TIMEOUT_MS || 30000),
  },

  memory: {
    similarTopK: Number(process.env.MEMORY_SIMILAR_TOP_K || 5),
    listLimit: Number(process.env.MEMORY_LIST_LIMIT || 100),
  },
} as const;

export type AppConfig = typeof config;
