import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { createHash } from "crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { AssetCachePort } from "@reranker/out-ports";

/**
 * AssetFileAdapter - AssetCachePort on the local file system.
 *
 * One file per entry, named by the SHA-256 of `<namespace>:<url>`, so a
 * different namespace never sees another generation's files. Writes go to a
 * temporary file first and are renamed into place; a reader sees either the
 * whole asset or nothing.
 */
@Injectable()
export class AssetFileAdapter extends AssetCachePort {
  private readonly logger = new Logger(AssetFileAdapter.name);
  private readonly namespace: string;
  private readonly directory: string;

  constructor(private readonly configService: ConfigService) {
    super();
    const config = this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);
    this.namespace = config.cacheNamespace;
    this.directory = config.cacheDir;
  }

  async get(url: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(url)));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async put(url: string, bytes: Uint8Array): Promise<void> {
    const target = this.pathFor(url);
    if (await exists(target)) return;

    await mkdir(this.directory, { recursive: true });
    const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(temporary, bytes);
      await rename(temporary, target);
      this.logger.debug(`Cached ${url} in ${this.directory}`);
    } catch (error) {
      await rm(temporary, { force: true });
      throw error;
    }
  }

  pathFor(url: string): string {
    const digest = createHash("sha256")
      .update(`${this.namespace}:${url}`)
      .digest("hex");
    return join(this.directory, digest);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}
