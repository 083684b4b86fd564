export * from './types';
export * from './similarity';
export * from './hungarian';
export * from './embeddingStore';
export * from './EmbeddingService';
export * from './HashingEmbeddingBackend';
export * from './OpenAICompatibleEmbeddingBackend';
export * from './EmbeddingServiceFactory';
export * from './SemanticSearch';
