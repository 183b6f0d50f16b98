import { LatencyBucket } from '../value-objects';
import { Latency } from './latency';

describe('Latency', () => {
  it.each([
    [0, LatencyBucket.P_SUB_50MS],
    [49, LatencyBucket.P_SUB_50MS],
    [50, LatencyBucket.P_50_200MS],
    [499, LatencyBucket.P_200_500MS],
    [999, LatencyBucket.P_500_1000MS],
    [1000, LatencyBucket.P_OVER_1000MS],
    [-1, LatencyBucket.P_UNKNOWN],
  ])('should bucket %p ms as %s', (durationMs, bucket) => {
    expect(Latency.getBucket(durationMs)).toBe(bucket);
  });
});
