export { AssetInMemoryAdapter } from "./cache/in-memory/asset-in-memory.adapter";
export { AssetFileAdapter } from "./cache/file/asset-file.adapter";
export { AssetRedisAdapter } from "./cache/redis/asset-redis.adapter";
export { RedisClient } from "./cache/redis/redis.client";
export { HttpAssetFetcher } from "./fetch/http-asset.fetcher";
export { VoyageClient } from "./api/voyage/voyage.client";
export {
  VoyageModelFactory,
  VoyageSimilarityModel,
  truncateWords,
} from "./api/voyage/voyage-model.factory";
export { InlineControlChannel } from "./channel/inline/inline-control.channel";
export {
  ParentPortChannel,
  ENGINE_PARENT_PORT,
} from "./channel/worker/parent-port.channel";
export { WorkerControlChannel } from "./channel/worker/worker-control.channel";
export type { EngineWorkerHandle } from "./channel/worker/worker-control.channel";
