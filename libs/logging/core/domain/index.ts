export { Latency } from './latency';
export { RankEvent } from './rank-event';
export type { RankSummary } from './rank-event';
