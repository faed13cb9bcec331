export const EMBEDDING_GATEWAY = Symbol('EMBEDDING_GATEWAY');

/**
 * Text to vector capability. Implementations throw `EmbeddingError` when the
 * provider is unreachable or answers with something that is not a vector.
 */
export interface EmbeddingGateway {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
