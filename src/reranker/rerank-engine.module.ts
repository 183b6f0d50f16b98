import { DynamicModule, Module, Provider, Type } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { RerankEngineUseCase } from "@reranker/in-ports";
import {
  AssetCachePort,
  AssetFetcherPort,
  CommandSourcePort,
  EventSinkPort,
  ModelFactoryPort,
} from "@reranker/out-ports";
import {
  AssetLoaderService,
  EngineStateService,
  IncrementalRankerService,
  RerankEngineService,
} from "@reranker/service";
import {
  AssetFileAdapter,
  AssetInMemoryAdapter,
  AssetRedisAdapter,
  HttpAssetFetcher,
  RedisClient,
  VoyageClient,
  VoyageModelFactory,
} from "@reranker/infrastructure";

/**
 * RerankEngineModule - the engine and everything it loads the model with.
 *
 * The engine only knows a CommandSourcePort and an EventSinkPort; the
 * channel class passed to `forChannel` provides both, so the same module
 * runs inline next to the host or alone inside a worker thread.
 */
@Module({})
export class RerankEngineModule {
  static forChannel(
    channel: Type<CommandSourcePort & EventSinkPort>,
    extraProviders: Provider[] = [],
  ): DynamicModule {
    return {
      module: RerankEngineModule,
      providers: [
        ...extraProviders,
        // Transport (both engine-side ends)
        channel,
        { provide: CommandSourcePort, useExisting: channel },
        { provide: EventSinkPort, useExisting: channel },
        // Infrastructure Clients (Initialization only)
        RedisClient,
        VoyageClient,
        // Asset cache adapters, one selected by ASSET_CACHE_TYPE
        AssetFileAdapter,
        AssetRedisAdapter,
        AssetInMemoryAdapter,
        {
          provide: AssetCachePort,
          useFactory: (
            configService: ConfigService,
            file: AssetFileAdapter,
            redis: AssetRedisAdapter,
            memory: AssetInMemoryAdapter,
          ): AssetCachePort => {
            const { cacheType } =
              configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);
            if (cacheType === "redis") return redis;
            if (cacheType === "memory") return memory;
            return file;
          },
          inject: [
            ConfigService,
            AssetFileAdapter,
            AssetRedisAdapter,
            AssetInMemoryAdapter,
          ],
        },
        // Infrastructures (Outbound Ports, Adapters)
        {
          provide: AssetFetcherPort,
          useClass: HttpAssetFetcher,
        },
        {
          provide: ModelFactoryPort,
          useClass: VoyageModelFactory,
        },
        // Services
        EngineStateService,
        AssetLoaderService,
        IncrementalRankerService,
        RerankEngineService,
        {
          provide: RerankEngineUseCase,
          useExisting: RerankEngineService,
        },
      ],
      exports: [channel, RerankEngineUseCase],
    };
  }
}
