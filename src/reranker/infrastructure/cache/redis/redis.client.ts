import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { createClient, RedisClientType } from "redis";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { ErrorNormalizer } from "@logging";

/**
 * RedisClient - owns the Redis connection for the asset cache.
 *
 * Connects only when ASSET_CACHE_TYPE=redis; the adapter asks for the
 * client lazily, so other cache types never open a socket.
 */
@Injectable()
export class RedisClient implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisClient.name);
  private client: RedisClientType | null = null;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const config = this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);

    if (config.cacheType !== "redis") {
      this.logger.log("Redis client skipped (ASSET_CACHE_TYPE is not redis)");
      return;
    }

    this.client = createClient({ url: config.redisUrl });

    this.client.on("error", (err: unknown) => {
      this.logger.error(`Redis client error: ${ErrorNormalizer.messageOf(err)}`);
    });

    this.client.on("reconnecting", () => {
      this.logger.warn("Redis client reconnecting...");
    });

    try {
      await this.client.connect();
      this.logger.log(`Connected to Redis at ${config.redisUrl}`);
    } catch (error) {
      this.logger.error(
        `Failed to connect to Redis: ${ErrorNormalizer.messageOf(error)}`,
      );
      throw error;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.logger.log("Redis connection closed");
    }
  }

  getClient(): RedisClientType {
    if (!this.client) {
      throw new Error("Redis client not initialized");
    }
    return this.client;
  }
}
