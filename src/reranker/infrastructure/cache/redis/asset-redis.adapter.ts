import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { commandOptions } from "redis";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { AssetCachePort } from "@reranker/out-ports";
import { RedisClient } from "./redis.client";

/**
 * AssetRedisAdapter - AssetCachePort backed by Redis string values.
 *
 * Entries have no TTL. `SET NX` keeps the first write for a key.
 */
@Injectable()
export class AssetRedisAdapter extends AssetCachePort {
  private readonly namespace: string;

  constructor(
    private readonly redisClient: RedisClient,
    private readonly configService: ConfigService,
  ) {
    super();
    this.namespace =
      this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY).cacheNamespace;
  }

  private get client() {
    return this.redisClient.getClient();
  }

  async get(url: string): Promise<Uint8Array | null> {
    const data = await this.client.get(
      commandOptions({ returnBuffers: true }),
      this.keyFor(url),
    );
    return data ? new Uint8Array(data) : null;
  }

  async put(url: string, bytes: Uint8Array): Promise<void> {
    await this.client.set(this.keyFor(url), Buffer.from(bytes), { NX: true });
  }

  keyFor(url: string): string {
    return `${this.namespace}:${url}`;
  }
}
