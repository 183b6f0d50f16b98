export enum RerankErrorCode {
  ASSET_FETCH_FAILED = 'ASSET_FETCH_FAILED',
  MODEL_CONSTRUCTION_FAILED = 'MODEL_CONSTRUCTION_FAILED',
  DOCUMENT_SCORING_FAILED = 'DOCUMENT_SCORING_FAILED',
  INVALID_COMMAND = 'INVALID_COMMAND',
  WORKER_FAILED = 'WORKER_FAILED',
}

/**
 * Base class for engine errors. `code` is what reaches the host in an
 * `error` event, so it has to stay stable.
 */
export class RerankError extends Error {
  constructor(
    public readonly code: RerankErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A manifest file could not be retrieved from any base URL, or what came
 * back was malformed. Fatal for the current load.
 */
export class AssetFetchError extends RerankError {
  constructor(
    public readonly fileName: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      RerankErrorCode.ASSET_FETCH_FAILED,
      `Download failed for ${fileName}: ${reason}`,
      options,
    );
  }
}

/**
 * Assets were retrieved but the model handle could not be built from them.
 */
export class ModelConstructionError extends RerankError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(
      RerankErrorCode.MODEL_CONSTRUCTION_FAILED,
      `Model construction failed: ${reason}`,
      options,
    );
  }
}

/**
 * Scoring one document failed. Recovered inside the ranker; never emitted.
 */
export class DocumentScoringError extends RerankError {
  constructor(
    public readonly documentId: string | number,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      RerankErrorCode.DOCUMENT_SCORING_FAILED,
      `Scoring failed for document ${documentId}: ${reason}`,
      options,
    );
  }
}

/**
 * One request for one URL failed. `retryable` tells the loader whether
 * another attempt against the same URL can help.
 */
export class AssetRequestError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AssetRequestError';
  }

  static isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || status >= 500;
  }
}
