export { combineScorableText } from "./document";
export type { RankDocument, RankRequest } from "./document";
export { RankingProgress } from "./ranking-progress";
export { EngineState } from "./engine-state.enum";
export type { SimilarityModel, ModelAssets } from "./similarity-model";
