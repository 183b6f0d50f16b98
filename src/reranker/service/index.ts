export { AssetLoaderService } from "./asset-loader.service";
export { EngineStateService } from "./engine-state.service";
export { IncrementalRankerService } from "./incremental-ranker.service";
export { RerankEngineService } from "./rerank-engine.service";
export { RerankHostService } from "./rerank-host.service";
export type { HostEngineStatus, RerankStatus } from "./rerank-host.service";
