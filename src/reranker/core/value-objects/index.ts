export {
  RerankErrorCode,
  RerankError,
  AssetFetchError,
  ModelConstructionError,
  DocumentScoringError,
  AssetRequestError,
} from './rerank-errors.vo';
export { MODEL_ASSET_MANIFEST } from './asset-manifest';
