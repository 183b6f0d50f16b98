import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { setTimeout as sleep } from "timers/promises";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { ErrorNormalizer } from "@logging";
import { ModelAssets, SimilarityModel } from "@reranker/domain";
import {
  AssetCachePort,
  AssetFetcherPort,
  ModelFactoryPort,
} from "@reranker/out-ports";
import {
  AssetFetchError,
  AssetRequestError,
  MODEL_ASSET_MANIFEST,
  ModelConstructionError,
  RerankError,
} from "@reranker/value-objects";

interface AssetCandidate {
  url: string;
  /** Local candidates get one attempt; the remote one gets the retry budget. */
  maxAttempts: number;
}

/**
 * AssetLoaderService - fetches the model manifest and builds the handle.
 *
 * Every file is looked up in the AssetCachePort first. On a miss it is
 * fetched from the local base URL (when configured) and then from the remote
 * model repository. Downloads are validated and written to the cache before
 * they are used, so a malformed or half-finished download is never served
 * from the cache later.
 */
@Injectable()
export class AssetLoaderService {
  private readonly logger = new Logger(AssetLoaderService.name);
  private readonly config: RerankConfig;

  constructor(
    private readonly assetCache: AssetCachePort,
    private readonly assetFetcher: AssetFetcherPort,
    private readonly modelFactory: ModelFactoryPort,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);
  }

  /**
   * Retrieves every manifest file and constructs the model handle.
   *
   * @param onStatus receives one progress line per asset and per phase
   * @throws AssetFetchError when a file cannot be retrieved from any base URL
   * @throws ModelConstructionError when the factory rejects the assets
   */
  async load(onStatus: (text: string) => void): Promise<SimilarityModel> {
    const startTime = Date.now();
    const assets = new Map<string, Uint8Array>();

    for (const file of MODEL_ASSET_MANIFEST) {
      onStatus(`Downloading ${file}...`);
      assets.set(file, await this.resolveAsset(file));
    }

    onStatus("Instantiating model...");
    const model = await this.constructModel(assets);

    const loadTime = ((Date.now() - startTime) / 1000).toFixed(2);
    this.logger.log(`Model ${model.id} loaded in ${loadTime} seconds`);
    return model;
  }

  /**
   * URLs a manifest file may be fetched from, in preference order.
   */
  candidatesFor(file: string): AssetCandidate[] {
    const candidates: AssetCandidate[] = [];
    if (this.config.localBaseUrl) {
      candidates.push({ url: this.config.localBaseUrl + file, maxAttempts: 1 });
    }
    candidates.push({
      url: this.config.remoteBaseUrl + file,
      maxAttempts: this.config.fetchMaxAttempts,
    });
    return candidates;
  }

  private async resolveAsset(file: string): Promise<Uint8Array> {
    const candidates = this.candidatesFor(file);

    for (const candidate of candidates) {
      const cached = await this.readCache(candidate.url);
      if (cached) {
        this.logger.debug(`Cache hit for ${file} (${candidate.url})`);
        return cached;
      }
    }

    const failures: string[] = [];
    let lastError: unknown;

    for (const candidate of candidates) {
      try {
        this.logger.debug(`Cache miss for ${file}. Fetching ${candidate.url}`);
        const bytes = await this.fetchWithRetry(candidate);
        this.validate(file, bytes);
        await this.writeCache(candidate.url, bytes);
        this.logger.log(`Fetched and cached ${file} (${bytes.byteLength} bytes)`);
        return bytes;
      } catch (error) {
        lastError = error;
        failures.push(`${candidate.url}: ${ErrorNormalizer.messageOf(error)}`);
        this.logger.warn(
          `Could not retrieve ${file} from ${candidate.url}: ${ErrorNormalizer.messageOf(error)}`,
        );
      }
    }

    throw new AssetFetchError(file, failures.join("; "), { cause: lastError });
  }

  private async fetchWithRetry(candidate: AssetCandidate): Promise<Uint8Array> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.assetFetcher.fetch(
          candidate.url,
          this.config.fetchTimeoutMs,
        );
      } catch (error) {
        const retryable =
          !(error instanceof AssetRequestError) || error.retryable;
        if (!retryable || attempt >= candidate.maxAttempts) {
          throw error;
        }

        const delayMs = this.config.fetchBackoffMs * 2 ** (attempt - 1);
        this.logger.warn(
          `Attempt ${attempt}/${candidate.maxAttempts} for ${candidate.url} failed ` +
            `(${ErrorNormalizer.messageOf(error)}). Retrying in ${delayMs}ms`,
        );
        await sleep(delayMs);
      }
    }
  }

  /**
   * Rejects downloads that cannot be right: empty bodies, and JSON assets
   * that do not parse.
   */
  private validate(file: string, bytes: Uint8Array): void {
    if (bytes.byteLength === 0) {
      throw new AssetRequestError("empty response body", false);
    }

    if (file.endsWith(".json")) {
      try {
        JSON.parse(Buffer.from(bytes).toString("utf8"));
      } catch (error) {
        throw new AssetRequestError("malformed JSON", false, undefined, {
          cause: error,
        });
      }
    }
  }

  private async constructModel(assets: ModelAssets): Promise<SimilarityModel> {
    try {
      return await this.modelFactory.create(assets);
    } catch (error) {
      if (error instanceof RerankError) throw error;
      throw new ModelConstructionError(ErrorNormalizer.messageOf(error), {
        cause: error,
      });
    }
  }

  /**
   * A failing cache read is treated as a miss; the network is still there.
   */
  private async readCache(url: string): Promise<Uint8Array | null> {
    try {
      return await this.assetCache.get(url);
    } catch (error) {
      this.logger.warn(
        `Asset cache read failed for ${url}: ${ErrorNormalizer.messageOf(error)}`,
      );
      return null;
    }
  }

  /**
   * A failing cache write costs a re-download next time, not this load.
   */
  private async writeCache(url: string, bytes: Uint8Array): Promise<void> {
    try {
      await this.assetCache.put(url, bytes);
    } catch (error) {
      this.logger.warn(
        `Asset cache write failed for ${url}: ${ErrorNormalizer.messageOf(error)}`,
      );
    }
  }
}
