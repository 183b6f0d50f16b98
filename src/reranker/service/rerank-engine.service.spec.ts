import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { Subject } from "rxjs";
import { loadRerankConfig, RERANK_CONFIG_KEY } from "@config";
import { LoggingUseCase } from "@logging";
import { EngineState, RankDocument, SimilarityModel } from "@reranker/domain";
import { EngineEvent } from "@reranker/dtos";
import {
  AssetCachePort,
  AssetFetcherPort,
  CommandSourcePort,
  EventSinkPort,
  ModelFactoryPort,
} from "@reranker/out-ports";
import {
  AssetRequestError,
  MODEL_ASSET_MANIFEST,
  RerankErrorCode,
} from "@reranker/value-objects";
import { AssetInMemoryAdapter } from "@reranker/infrastructure";
import { AssetLoaderService } from "./asset-loader.service";
import { EngineStateService } from "./engine-state.service";
import { IncrementalRankerService } from "./incremental-ranker.service";
import { RerankEngineService } from "./rerank-engine.service";

const REMOTE = "https://models.test/repo/resolve/main/";

describe("RerankEngineService", () => {
  let engine: RerankEngineService;
  let emitted: EngineEvent[];
  let commands$: Subject<unknown>;

  const model: SimilarityModel = {
    id: "test-model",
    similarity: (_query: string, text: string) => (text === "beta" ? 0.9 : 0.1),
    dispose: jest.fn(),
  };
  const mockFetcher = { fetch: jest.fn() };
  const mockFactory = { create: jest.fn() };
  const mockEventSink = {
    emit: jest.fn((event: EngineEvent) => {
      emitted.push(event);
    }),
  };
  const mockLoggingService = { recordRank: jest.fn(), getStats: jest.fn() };

  const docs: RankDocument[] = [
    { id: "a", title: "alpha" },
    { id: "b", title: "beta" },
  ];

  const typesOf = (events: EngineEvent[]) => events.map((event) => event.type);

  beforeEach(async () => {
    jest.clearAllMocks();
    emitted = [];
    commands$ = new Subject<unknown>();
    mockFetcher.fetch.mockImplementation(async (url: string) =>
      Buffer.from(url.endsWith(".json") ? "{}" : "bytes"),
    );
    mockFactory.create.mockResolvedValue(model);

    const config = {
      ...loadRerankConfig({}),
      localBaseUrl: null,
      remoteBaseUrl: REMOTE,
      fetchBackoffMs: 0,
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RerankEngineService,
        AssetLoaderService,
        IncrementalRankerService,
        EngineStateService,
        AssetInMemoryAdapter,
        { provide: AssetCachePort, useExisting: AssetInMemoryAdapter },
        { provide: AssetFetcherPort, useValue: mockFetcher },
        { provide: ModelFactoryPort, useValue: mockFactory },
        { provide: EventSinkPort, useValue: mockEventSink },
        { provide: CommandSourcePort, useValue: { commands: () => commands$ } },
        { provide: LoggingUseCase, useValue: mockLoggingService },
        {
          provide: ConfigService,
          useValue: new ConfigService({ [RERANK_CONFIG_KEY]: config }),
        },
      ],
    }).compile();

    engine = module.get<RerankEngineService>(RerankEngineService);
  });

  it("should be defined", () => {
    expect(engine).toBeDefined();
    expect(engine.getState()).toBe(EngineState.UNLOADED);
  });

  describe("load", () => {
    it("should report progress and become ready", async () => {
      await engine.load();

      expect(emitted).toEqual([
        ...MODEL_ASSET_MANIFEST.map((file) => ({
          type: "status",
          text: `Downloading ${file}...`,
        })),
        { type: "status", text: "Instantiating model..." },
        { type: "model-ready" },
      ]);
      expect(engine.getState()).toBe(EngineState.READY);
    });

    it("should only signal readiness the second time", async () => {
      await engine.load();
      emitted = [];

      await engine.load();

      expect(emitted).toEqual([{ type: "model-ready" }]);
      expect(mockFetcher.fetch).toHaveBeenCalledTimes(MODEL_ASSET_MANIFEST.length);
      expect(mockFactory.create).toHaveBeenCalledTimes(1);
    });

    it("should join a load that is already running", async () => {
      await Promise.all([engine.load(), engine.load()]);

      expect(mockFetcher.fetch).toHaveBeenCalledTimes(MODEL_ASSET_MANIFEST.length);
      expect(typesOf(emitted).filter((type) => type === "model-ready")).toHaveLength(1);
    });

    it("should return to Unloaded after a failed load and reuse cached files on retry", async () => {
      mockFetcher.fetch.mockImplementation(async (url: string) => {
        if (url === REMOTE + "config.json") {
          throw new AssetRequestError("HTTP 404 Not Found", false, 404);
        }
        return Buffer.from(url.endsWith(".json") ? "{}" : "bytes");
      });

      await engine.load();

      expect(engine.getState()).toBe(EngineState.UNLOADED);
      expect(emitted[emitted.length - 1]).toEqual({
        type: "error",
        code: RerankErrorCode.ASSET_FETCH_FAILED,
        text: `Download failed for config.json: ${REMOTE}config.json: HTTP 404 Not Found`,
      });
      expect(mockFetcher.fetch).toHaveBeenCalledTimes(3);

      mockFetcher.fetch.mockImplementation(async (url: string) =>
        Buffer.from(url.endsWith(".json") ? "{}" : "bytes"),
      );
      await engine.load();

      expect(engine.getState()).toBe(EngineState.READY);
      expect(mockFetcher.fetch).toHaveBeenCalledTimes(3 + MODEL_ASSET_MANIFEST.length - 2);
    });

    it("should report a construction failure", async () => {
      mockFactory.create.mockRejectedValue(new Error("unsupported architecture"));

      await engine.load();

      expect(emitted[emitted.length - 1]).toEqual({
        type: "error",
        code: RerankErrorCode.MODEL_CONSTRUCTION_FAILED,
        text: "Model construction failed: unsupported architecture",
      });
      expect(engine.getState()).toBe(EngineState.UNLOADED);
    });
  });

  describe("rank", () => {
    it("should refuse to rank before the model is ready", async () => {
      await engine.rank({ type: "rank", requestId: 1, queryText: "q", documents: docs });

      expect(emitted).toEqual([
        { type: "status", text: "Model is not ready; ignoring rank request #1." },
      ]);
    });

    it("should rank once loaded", async () => {
      await engine.load();
      emitted = [];

      await engine.rank({ type: "rank", requestId: 1, queryText: "q", documents: docs });

      expect(emitted[emitted.length - 1]).toEqual({
        type: "rank-complete",
        requestId: 1,
        snapshot: [
          { id: "b", title: "beta", rerankScore: 0.9 },
          { id: "a", title: "alpha", rerankScore: 0.1 },
        ],
      });
    });

    it("should ignore a request id that is not newer than the latest", async () => {
      await engine.load();
      await engine.rank({ type: "rank", requestId: 2, queryText: "q", documents: docs });
      emitted = [];

      await engine.rank({ type: "rank", requestId: 2, queryText: "q", documents: docs });
      await engine.rank({ type: "rank", requestId: 1, queryText: "q", documents: docs });

      expect(emitted).toEqual([]);
    });
  });

  describe("dispatch", () => {
    it("should answer an invalid rank command with an error event", async () => {
      await engine.dispatch({ type: "rank", requestId: 0, queryText: "q", documents: [] });

      expect(emitted).toHaveLength(1);
      expect(emitted[0]).toMatchObject({
        type: "error",
        code: RerankErrorCode.INVALID_COMMAND,
      });
    });

    it("should ignore unknown commands", async () => {
      await engine.dispatch({ type: "shutdown" });
      await engine.dispatch("load");

      expect(emitted).toEqual([]);
    });

    it("should route validated commands", async () => {
      await engine.dispatch({ type: "load" });
      await engine.dispatch({
        type: "rank",
        requestId: 3,
        queryText: "q",
        documents: [{ id: "a", title: "alpha", lang: "en" }],
      });

      expect(emitted[emitted.length - 1]).toEqual({
        type: "rank-complete",
        requestId: 3,
        snapshot: [{ id: "a", title: "alpha", lang: "en", rerankScore: 0.1 }],
      });
    });
  });

  describe("lifecycle", () => {
    it("should consume commands from the channel", async () => {
      engine.onModuleInit();

      commands$.next({ type: "load" });
      await new Promise((resolve) => setImmediate(resolve));

      expect(typesOf(emitted)).toContain("model-ready");
    });

    it("should dispose the model on shutdown", async () => {
      engine.onModuleInit();
      await engine.load();

      await engine.onModuleDestroy();

      expect(model.dispose).toHaveBeenCalledTimes(1);
      commands$.next({ type: "load" });
      await new Promise((resolve) => setImmediate(resolve));
      expect(typesOf(emitted).filter((type) => type === "model-ready")).toHaveLength(1);
    });
  });
});
