export { AssetCachePort } from "./asset-cache.port";
export { AssetFetcherPort } from "./asset-fetcher.port";
export { ModelFactoryPort } from "./model-factory.port";
export { EventSinkPort } from "./event-sink.port";
export { CommandSourcePort } from "./command-source.port";
export { ControlChannelPort } from "./control-channel.port";
