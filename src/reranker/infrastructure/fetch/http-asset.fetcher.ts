import { Injectable, Logger } from "@nestjs/common";
import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { ErrorNormalizer } from "@logging";
import { AssetFetcherPort } from "@reranker/out-ports";
import { AssetRequestError } from "@reranker/value-objects";

/**
 * HttpAssetFetcher - retrieves one asset URL.
 *
 * `file:` URLs are read from disk (a missing file is permanent); anything
 * else goes through fetch with a per-attempt timeout. Network failures,
 * timeouts and retryable HTTP statuses come back as retryable errors.
 */
@Injectable()
export class HttpAssetFetcher extends AssetFetcherPort {
  private readonly logger = new Logger(HttpAssetFetcher.name);

  async fetch(url: string, timeoutMs: number): Promise<Uint8Array> {
    if (url.startsWith("file:")) {
      return this.readLocal(url);
    }
    return this.download(url, timeoutMs);
  }

  private async readLocal(url: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(fileURLToPath(url)));
    } catch (error) {
      throw new AssetRequestError(
        `Cannot read ${url}: ${ErrorNormalizer.messageOf(error)}`,
        false,
        undefined,
        { cause: error },
      );
    }
  }

  private async download(url: string, timeoutMs: number): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      const normalized = ErrorNormalizer.normalize(error);
      throw new AssetRequestError(
        `Request to ${url} failed: ${normalized.message}`,
        true,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new AssetRequestError(
        `HTTP ${response.status} ${response.statusText} for ${url}`,
        AssetRequestError.isRetryableStatus(response.status),
        response.status,
      );
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    this.logger.debug(`Downloaded ${bytes.byteLength} bytes from ${url}`);
    return bytes;
  }
}
