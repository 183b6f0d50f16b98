import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { AssetCachePort } from "@reranker/out-ports";

/**
 * AssetInMemoryAdapter - Map-backed AssetCachePort.
 *
 * Lives as long as the process, so it only saves repeated loads within one
 * run. Used by tests and when ASSET_CACHE_TYPE=memory.
 */
@Injectable()
export class AssetInMemoryAdapter
  extends AssetCachePort
  implements OnModuleDestroy
{
  private readonly logger = new Logger(AssetInMemoryAdapter.name);
  private readonly cache = new Map<string, Uint8Array>();
  private readonly namespace: string;

  constructor(private readonly configService: ConfigService) {
    super();
    this.namespace =
      this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY).cacheNamespace;
  }

  async get(url: string): Promise<Uint8Array | null> {
    return this.cache.get(this.keyFor(url)) ?? null;
  }

  async put(url: string, bytes: Uint8Array): Promise<void> {
    const key = this.keyFor(url);
    if (!this.cache.has(key)) {
      this.cache.set(key, bytes);
    }
  }

  size(): number {
    return this.cache.size;
  }

  onModuleDestroy(): void {
    this.cache.clear();
    this.logger.log("AssetInMemoryAdapter destroyed");
  }

  private keyFor(url: string): string {
    return `${this.namespace}:${url}`;
  }
}
