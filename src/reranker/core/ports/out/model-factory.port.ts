import { ModelAssets, SimilarityModel } from "@reranker/domain";

/**
 * Outbound port for the inference capability that turns downloaded model
 * assets into a scoring handle.
 */
export abstract class ModelFactoryPort {
  abstract create(assets: ModelAssets): Promise<SimilarityModel>;
}
