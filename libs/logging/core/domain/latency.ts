import { LatencyBucket } from '../value-objects';

export class Latency {
  /**
   * Maps a duration onto its LatencyBucket.
   */
  static getBucket(durationMs?: number): LatencyBucket {
    if (durationMs === undefined || durationMs === null || durationMs < 0)
      return LatencyBucket.P_UNKNOWN;
    if (durationMs < 50) return LatencyBucket.P_SUB_50MS;
    if (durationMs < 200) return LatencyBucket.P_50_200MS;
    if (durationMs < 500) return LatencyBucket.P_200_500MS;
    if (durationMs < 1000) return LatencyBucket.P_500_1000MS;
    return LatencyBucket.P_OVER_1000MS;
  }
}
