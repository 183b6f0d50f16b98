import { join } from "path";
import { pathToFileURL } from "url";
import {
  DEFAULT_CACHE_NAMESPACE,
  DEFAULT_CUTOFF,
  loadRerankConfig,
} from "./rerank.config";
import { resolveProjectRoot } from "./utils/path.config";

describe("loadRerankConfig", () => {
  it("should fall back to defaults", () => {
    const config = loadRerankConfig({});

    expect(config).toMatchObject({
      cutoff: DEFAULT_CUTOFF,
      cacheType: "file",
      cacheNamespace: DEFAULT_CACHE_NAMESPACE,
      cacheDir: join(resolveProjectRoot(), ".cache", "model-assets"),
      redisUrl: "redis://localhost:6379",
      localBaseUrl: null,
      remoteBaseUrl:
        "https://huggingface.co/lightonai/answerai-colbert-small-v1/resolve/main/",
      fetchTimeoutMs: 60000,
      fetchMaxAttempts: 3,
      fetchBackoffMs: 1000,
      scoreTimeoutMs: 10000,
      voyageApiKey: null,
      rerankModel: "rerank-2",
      transport: "inline",
    });
    expect(config.cutoff).toBe(30);
    expect(config.cacheNamespace).toBe("rerank-model-cache-v1");
  });

  it("should read overrides from the environment", () => {
    const config = loadRerankConfig({
      RERANK_CUTOFF: "5",
      ASSET_CACHE_TYPE: "redis",
      REDIS_HOST: "cache.internal",
      REDIS_PORT: "6380",
      MODEL_REPO: "test-org/test-model",
      MODEL_REMOTE_BASE_URL: "https://mirror.test/models",
      VOYAGE_API_KEY: "test-secret",
      ENGINE_TRANSPORT: "worker",
    });

    expect(config).toMatchObject({
      cutoff: 5,
      cacheType: "redis",
      redisUrl: "redis://cache.internal:6380",
      modelRepo: "test-org/test-model",
      remoteBaseUrl: "https://mirror.test/models/",
      voyageApiKey: "test-secret",
      transport: "worker",
    });
  });

  it("should turn a local directory into a file URL", () => {
    const config = loadRerankConfig({ MODEL_LOCAL_BASE_URL: "/srv/models" });

    expect(config.localBaseUrl).toBe(`${pathToFileURL("/srv/models").href}/`);
  });

  it("should ignore invalid numbers", () => {
    const config = loadRerankConfig({
      RERANK_CUTOFF: "-3",
      ASSET_FETCH_MAX_ATTEMPTS: "zero",
      ASSET_CACHE_TYPE: "s3",
    });

    expect(config.cutoff).toBe(DEFAULT_CUTOFF);
    expect(config.fetchMaxAttempts).toBe(3);
    expect(config.cacheType).toBe("file");
  });
});
