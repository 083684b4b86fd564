export type SemanticSearchErrorCode =
  | 'INPUT_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'DEGENERATE_VECTOR'
  | 'INVALID_SCORE'
  | 'SOLVER_INVARIANT'
  | 'EMBEDDING_BACKEND';

/**
 * Base class for every error raised by this package.
 * Errors thrown by a caller-supplied embedder are passed through untouched.
 */
export class SemanticSearchError extends Error {
  readonly code: SemanticSearchErrorCode;

  constructor(code: SemanticSearchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised before any embedding call when the arguments cannot produce a result
 */
export class InputError extends SemanticSearchError {
  constructor(message: string) {
    super('INPUT_ERROR', message);
  }
}

export class DimensionMismatchError extends SemanticSearchError {
  readonly leftLength: number;
  readonly rightLength: number;

  constructor(leftLength: number, rightLength: number) {
    super(
      'DIMENSION_MISMATCH',
      `Vectors must have the same length (got ${leftLength} and ${rightLength})`
    );
    this.leftLength = leftLength;
    this.rightLength = rightLength;
  }
}

export class DegenerateVectorError extends SemanticSearchError {
  constructor(message = 'Cosine similarity is undefined for a zero-norm vector') {
    super('DEGENERATE_VECTOR', message);
  }
}

export class InvalidScoreError extends SemanticSearchError {
  constructor(message = 'Similarity measure returned NaN') {
    super('INVALID_SCORE', message);
  }
}

/**
 * The assignment solver contradicted its own contract. Indicates a bug, not bad input.
 */
export class SolverInvariantError extends SemanticSearchError {
  constructor(message: string) {
    super('SOLVER_INVARIANT', message);
  }
}

export class EmbeddingBackendError extends SemanticSearchError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: ErrorOptions) {
    super('EMBEDDING_BACKEND', message, options);
    this.backend = backend;
  }
}
