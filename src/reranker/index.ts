export { RerankerModule } from "./reranker.module";
export type { RerankerModuleOptions } from "./reranker.module";
export { RerankEngineModule } from "./rerank-engine.module";
