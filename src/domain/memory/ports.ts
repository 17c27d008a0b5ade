/**
 * Memory engine contract and the smaller ports the semantic engine is built on.
 *
 * The gateway only ever sees `MemoryEngine`. Replies from `search` and
 * `listAll` are deliberately `unknown`: engines may answer with
 * `{ results: [...] }` or a bare array, and the gateway normalizes both.
 */

export interface ConversationMessage {
  role: string;
  content: string;
}

export type MemoryMetadata = Record<string, unknown>;

export interface MemoryEngine {
  extractAndStore(
    messages: ConversationMessage[],
    userId: string,
    metadata: MemoryMetadata
  ): Promise<unknown>;

  search(query: string, userId: string, limit: number): Promise<unknown>;

  listAll(userId: string): Promise<unknown>;

  deleteAll(userId: string): Promise<void>;
}

export interface StoredMemory {
  id: string;
  userId: string;
  memory: string;
  metadata: MemoryMetadata;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface ScoredMemory extends StoredMemory {
  score: number;
}

export interface NewMemory {
  id: string;
  userId: string;
  memory: string;
  embedding: number[];
  metadata: MemoryMetadata;
}

export interface MemoryVectorStore {
  insert(entry: NewMemory): Promise<void>;

  update(
    id: string,
    userId: string,
    memory: string,
    embedding: number[]
  ): Promise<void>;

  remove(id: string, userId: string): Promise<void>;

  search(
    userId: string,
    embedding: number[],
    limit: number
  ): Promise<ScoredMemory[]>;

  list(userId: string, limit: number): Promise<StoredMemory[]>;

  removeAll(userId: string): Promise<number>;
}

export interface EmbeddingPort {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export type MemoryEvent = "ADD" | "UPDATE" | "DELETE" | "NONE";

/**
 * One reconciliation decision. `id` is the alias the extractor was shown for
 * an existing memory, or any value for `ADD`.
 */
export interface MemoryAction {
  id: string;
  text: string;
  event: MemoryEvent;
}

export interface ExistingMemoryRef {
  id: string;
  text: string;
}

export interface FactExtractorPort {
  extractFacts(messages: ConversationMessage[]): Promise<string[]>;

  reconcile(
    existing: ExistingMemoryRef[],
    facts: string[]
  ): Promise<MemoryAction[]>;
}
