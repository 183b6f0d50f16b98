import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { VoyageAIClient } from "voyageai";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { ModelAssets, SimilarityModel } from "@reranker/domain";
import { ModelFactoryPort } from "@reranker/out-ports";
import {
  MODEL_ASSET_MANIFEST,
  ModelConstructionError,
} from "@reranker/value-objects";
import { VoyageClient } from "./voyage.client";

type RerankApi = Pick<VoyageAIClient, "rerank">;

/** Token budgets used when the sentence-transformers config leaves them out. */
const DEFAULT_QUERY_LENGTH = 32;
const DEFAULT_DOCUMENT_LENGTH = 300;

interface SequenceLimits {
  queryLength: number;
  documentLength: number;
}

/**
 * Scores one (query, document) pair through the Voyage rerank endpoint.
 * Inputs are cut to the sequence limits the downloaded model declares.
 */
export class VoyageSimilarityModel implements SimilarityModel {
  constructor(
    readonly id: string,
    private readonly api: RerankApi,
    private readonly model: string,
    private readonly limits: SequenceLimits,
  ) {}

  async similarity(query: string, document: string): Promise<number> {
    const response = await this.api.rerank({
      query: truncateWords(query, this.limits.queryLength),
      documents: [truncateWords(document, this.limits.documentLength)],
      model: this.model,
      topK: 1,
    });

    const score = response.data?.[0]?.relevanceScore;
    if (typeof score !== "number") {
      throw new Error("Invalid response from Voyage AI Rerank API");
    }
    return score;
  }
}

/**
 * VoyageModelFactory - ModelFactoryPort that checks the downloaded assets
 * and hands scoring to Voyage AI.
 */
@Injectable()
export class VoyageModelFactory extends ModelFactoryPort {
  private readonly logger = new Logger(VoyageModelFactory.name);
  private readonly modelRepo: string;

  constructor(
    private readonly voyageClient: VoyageClient,
    private readonly configService: ConfigService,
  ) {
    super();
    this.modelRepo =
      this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY).modelRepo;
  }

  async create(assets: ModelAssets): Promise<SimilarityModel> {
    for (const file of MODEL_ASSET_MANIFEST) {
      if (!assets.has(file)) {
        throw new ModelConstructionError(`missing asset ${file}`);
      }
      if (file.endsWith(".json")) {
        readJsonObject(assets, file);
      }
    }

    const limits = readSequenceLimits(assets);
    const api = this.voyageClient.getClient();
    if (!api) {
      throw new ModelConstructionError("VOYAGE_API_KEY is not configured");
    }

    const model = this.voyageClient.getModelName();
    this.logger.log(
      `Similarity model ready (${this.modelRepo}, query ${limits.queryLength} / document ${limits.documentLength} tokens)`,
    );
    return new VoyageSimilarityModel(
      `${this.modelRepo}+${model}`,
      api,
      model,
      limits,
    );
  }
}

function readJsonObject(
  assets: ModelAssets,
  file: string,
): Record<string, unknown> {
  const bytes = assets.get(file);
  if (!bytes) {
    throw new ModelConstructionError(`missing asset ${file}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch (error) {
    throw new ModelConstructionError(`${file} is not valid JSON`, {
      cause: error,
    });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ModelConstructionError(`${file} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function readSequenceLimits(assets: ModelAssets): SequenceLimits {
  const config = readJsonObject(assets, "config_sentence_transformers.json");
  return {
    queryLength: positiveInt(config.query_length, DEFAULT_QUERY_LENGTH),
    documentLength: positiveInt(config.document_length, DEFAULT_DOCUMENT_LENGTH),
  };
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : fallback;
}

/**
 * Keeps at most `limit` whitespace-separated words.
 */
export function truncateWords(text: string, limit: number): string {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  return words.length <= limit ? words.join(" ") : words.slice(0, limit).join(" ");
}
