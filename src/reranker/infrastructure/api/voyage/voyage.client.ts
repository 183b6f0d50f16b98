import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { VoyageAIClient } from "voyageai";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";

/**
 * VoyageClient - initializes the Voyage AI SDK client.
 *
 * The client is only created when an API key is configured; without one
 * model construction fails and the engine stays unloaded.
 */
@Injectable()
export class VoyageClient {
  private readonly logger = new Logger(VoyageClient.name);
  private readonly client: VoyageAIClient | null;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);
    this.model = config.rerankModel;

    if (!config.voyageApiKey) {
      this.logger.warn(
        "VOYAGE_API_KEY is not defined. Model construction will fail.",
      );
      this.client = null;
      return;
    }

    this.client = new VoyageAIClient({ apiKey: config.voyageApiKey });
    this.logger.log(`Voyage AI client initialized with model: ${this.model}`);
  }

  /**
   * The SDK client, or null when no API key is configured.
   */
  getClient(): VoyageAIClient | null {
    return this.client;
  }

  getModelName(): string {
    return this.model;
  }
}
