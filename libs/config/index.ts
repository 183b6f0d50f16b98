export { default as pathConfig, resolveProjectRoot } from "./utils/path.config";
export {
  default as rerankConfig,
  loadRerankConfig,
  RERANK_CONFIG_KEY,
  DEFAULT_CUTOFF,
  DEFAULT_CACHE_NAMESPACE,
  DEFAULT_MODEL_REPO,
} from "./rerank.config";
export type {
  RerankConfig,
  AssetCacheType,
  EngineTransport,
} from "./rerank.config";
