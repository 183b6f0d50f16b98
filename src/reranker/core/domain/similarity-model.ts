/**
 * Opaque model handle produced by the inference capability.
 * One instance lives for the whole engine lifetime.
 */
export interface SimilarityModel {
  readonly id: string;

  /**
   * Relevance of `document` to `query`; higher is more relevant.
   */
  similarity(query: string, document: string): number | Promise<number>;

  dispose?(): void | Promise<void>;
}

/**
 * Downloaded manifest files keyed by their manifest-relative name.
 */
export type ModelAssets = ReadonlyMap<string, Uint8Array>;
