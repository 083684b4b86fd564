// Core types for semantic search and matching

/**
 * Fixed-length numeric vector representing a piece of text.
 * Vectors compared with each other must share one length.
 */
export type Embedding = readonly number[];

/**
 * Scores two embeddings; higher means more similar. No range is implied.
 */
export type SimilarityMeasure = (v1: Embedding, v2: Embedding) => number;

/**
 * Maps an item to the text that is embedded and used as its cache key
 */
export type Projection<T> = (item: T) => string;

/**
 * The embedding capability the search core consumes
 */
export interface EmbeddingMapper {
  embed(text: string): Promise<Embedding>;
}

export interface ScoredItem<T> {
  item: T;
  score: number;
}

export interface AssignmentResult {
  /** Column chosen for each row, or -1 when the row is left unassigned */
  assignment: number[];
  totalCost: number;
}

export interface SemanticSearchOptions {
  similarity?: SimilarityMeasure;
  /** Maximum in-flight embedding calls per operation */
  concurrency?: number;
}

// Embedding backend contracts

export interface EmbeddingVector {
  vector: number[];
  dimension: number;
}

export interface EmbeddingRequest {
  texts: string[];
  requestId?: string;
}

export interface EmbeddingResponse {
  embeddings: EmbeddingVector[];
  processingTime: number;
  backend: string;
}

export interface OpenAICompatibleSettings {
  baseURL: string;
  apiKey: string;
  model: string;
  timeout: number;
  maxRetries: number;
}

export interface HashingSettings {
  dimensions: number;
}

export type EmbeddingBackendConfig =
  | {
      name: 'openai-compatible';
      enabled: boolean;
      priority: number;
      settings: OpenAICompatibleSettings;
    }
  | {
      name: 'hashing';
      enabled: boolean;
      priority: number;
      settings: HashingSettings;
    };

export type EmbeddingBackendName = EmbeddingBackendConfig['name'];
