import { RankSummary } from "@logging/domain";

export interface LoggingStats {
  recordedCount: number;
  droppedCount: number;
  pendingWrites: number;
  maxPendingWrites: number;
}

/**
 * Inbound port for recording ranking requests as wide events.
 */
export abstract class LoggingUseCase {
  /**
   * Record one finished ranking request. Never throws; persistence happens
   * in the background.
   */
  abstract recordRank(summary: RankSummary): void;

  abstract getStats(): LoggingStats;
}
