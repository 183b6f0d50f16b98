import { registerAs } from "@nestjs/config";
import { join, resolve } from "path";
import { pathToFileURL } from "url";
import { resolveProjectRoot } from "./utils/path.config";

export type AssetCacheType = "file" | "redis" | "memory";
export type EngineTransport = "inline" | "worker";

export interface RerankConfig {
  /** Leading candidates eligible for scoring; the rest pass through untouched. */
  cutoff: number;
  cacheType: AssetCacheType;
  /** Version-tagged so incompatible cache generations never collide. */
  cacheNamespace: string;
  cacheDir: string;
  redisUrl: string;
  modelRepo: string;
  localBaseUrl: string | null;
  remoteBaseUrl: string;
  fetchTimeoutMs: number;
  fetchMaxAttempts: number;
  fetchBackoffMs: number;
  scoreTimeoutMs: number;
  voyageApiKey: string | null;
  rerankModel: string;
  transport: EngineTransport;
}

export const RERANK_CONFIG_KEY = "rerank";

export const DEFAULT_CUTOFF = 30;
export const DEFAULT_CACHE_NAMESPACE = "rerank-model-cache-v1";
export const DEFAULT_MODEL_REPO = "lightonai/answerai-colbert-small-v1";

function readInt(
  value: string | undefined,
  fallback: number,
  min: number,
): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readOptional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Accepts either a URL (`http://…`, `file://…`) or a plain directory path.
 */
function toBaseUrl(value: string): string {
  const url = /^[a-z][a-z0-9+.-]*:\/\//i.test(value)
    ? value
    : pathToFileURL(resolve(value)).href;
  return withTrailingSlash(url);
}

/**
 * Builds the engine configuration from a flat environment map.
 * Exposed separately from the registerAs factory so the worker thread and
 * tests can build the same object without a ConfigModule.
 */
export function loadRerankConfig(
  env: NodeJS.ProcessEnv = process.env,
): RerankConfig {
  const cacheType = env.ASSET_CACHE_TYPE;
  const modelRepo = readOptional(env.MODEL_REPO) ?? DEFAULT_MODEL_REPO;
  const localBaseUrl = readOptional(env.MODEL_LOCAL_BASE_URL);
  const redisHost = readOptional(env.REDIS_HOST) ?? "localhost";
  const redisPort = readInt(env.REDIS_PORT, 6379, 1);

  return {
    cutoff: readInt(env.RERANK_CUTOFF, DEFAULT_CUTOFF, 0),
    cacheType:
      cacheType === "redis" || cacheType === "memory" ? cacheType : "file",
    cacheNamespace:
      readOptional(env.ASSET_CACHE_NAMESPACE) ?? DEFAULT_CACHE_NAMESPACE,
    cacheDir:
      readOptional(env.ASSET_CACHE_DIR) ??
      join(resolveProjectRoot(), ".cache", "model-assets"),
    redisUrl: `redis://${redisHost}:${redisPort}`,
    modelRepo,
    localBaseUrl: localBaseUrl ? toBaseUrl(localBaseUrl) : null,
    remoteBaseUrl: withTrailingSlash(
      readOptional(env.MODEL_REMOTE_BASE_URL) ??
        `https://huggingface.co/${modelRepo}/resolve/main/`,
    ),
    fetchTimeoutMs: readInt(env.ASSET_FETCH_TIMEOUT_MS, 60000, 1),
    fetchMaxAttempts: readInt(env.ASSET_FETCH_MAX_ATTEMPTS, 3, 1),
    fetchBackoffMs: readInt(env.ASSET_FETCH_BACKOFF_MS, 1000, 0),
    scoreTimeoutMs: readInt(env.SCORE_TIMEOUT_MS, 10000, 1),
    voyageApiKey: readOptional(env.VOYAGE_API_KEY),
    rerankModel: readOptional(env.RERANK_MODEL) ?? "rerank-2",
    transport: env.ENGINE_TRANSPORT === "worker" ? "worker" : "inline",
  };
}

export default registerAs(RERANK_CONFIG_KEY, () => loadRerankConfig());
