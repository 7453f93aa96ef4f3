/**
 * Embedding Type Definitions
 */

export interface EmbeddingVector {
  values: number[];
  dims: number;
  model: string;
}

/**
 * Text → vector capability. Stateless; retries are the caller's business.
 */
export interface EmbeddingProvider {
  readonly name: string;
  isAvailable(): boolean;

  /**
   * @throws EmbeddingUnavailable when the credential is missing or rejected
   * @throws EmbeddingError for transient failures
   */
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
}
