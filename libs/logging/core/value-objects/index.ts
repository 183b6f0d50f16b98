/**
 * Global Error Codes for the logging library.
 * These are generic system-level errors that can occur in any service.
 * Domain-specific errors should be defined within their respective modules.
 */
export enum ErrorCode {
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  TIMEOUT = 'TIMEOUT',
  UNKNOWN = 'UNKNOWN',
}

/**
 * How a ranking request ended. Superseded requests are not failures.
 */
export enum RankOutcome {
  COMPLETED = 'COMPLETED',
  SUPERSEDED = 'SUPERSEDED',
}

export enum LatencyBucket {
  P_SUB_50MS = 'P_SUB_50MS',
  P_50_200MS = 'P_50_200MS',
  P_200_500MS = 'P_200_500MS',
  P_500_1000MS = 'P_500_1000MS',
  P_OVER_1000MS = 'P_OVER_1000MS',
  P_UNKNOWN = 'P_UNKNOWN',
}
