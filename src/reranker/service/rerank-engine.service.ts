import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { Subscription } from "rxjs";
import { ErrorNormalizer } from "@logging";
import { EngineState, SimilarityModel } from "@reranker/domain";
import { parseEngineCommand, RankCommand } from "@reranker/dtos";
import { RerankEngineUseCase } from "@reranker/in-ports";
import { CommandSourcePort, EventSinkPort } from "@reranker/out-ports";
import { RerankErrorCode } from "@reranker/value-objects";
import { AssetLoaderService } from "./asset-loader.service";
import { EngineStateService } from "./engine-state.service";
import { IncrementalRankerService } from "./incremental-ranker.service";

@Injectable()
export class RerankEngineService
  extends RerankEngineUseCase
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(RerankEngineService.name);
  private model: SimilarityModel | null = null;
  private loading: Promise<void> | null = null;
  private subscription: Subscription | null = null;

  constructor(
    private readonly commandSource: CommandSourcePort,
    private readonly eventSink: EventSinkPort,
    private readonly assetLoader: AssetLoaderService,
    private readonly ranker: IncrementalRankerService,
    private readonly engineState: EngineStateService,
  ) {
    super();
  }

  onModuleInit(): void {
    this.subscription = this.commandSource.commands().subscribe({
      next: (raw) => {
        this.dispatch(raw).catch((error: unknown) => {
          this.logger.error(
            `Command handling failed: ${ErrorNormalizer.messageOf(error)}`,
          );
        });
      },
      error: (error: unknown) => {
        this.logger.error(
          `Command channel failed: ${ErrorNormalizer.messageOf(error)}`,
        );
      },
    });
    this.logger.log("Engine listening for commands");
  }

  async onModuleDestroy(): Promise<void> {
    this.subscription?.unsubscribe();
    this.subscription = null;
    if (this.model?.dispose) {
      await this.model.dispose();
    }
    this.model = null;
  }

  getState(): EngineState {
    return this.engineState.getState();
  }

  async dispatch(raw: unknown): Promise<void> {
    const parsed = parseEngineCommand(raw);
    if (!parsed.ok) {
      if (parsed.reason === "invalid") {
        this.logger.warn(`Rejected rank command: ${parsed.detail}`);
        this.eventSink.emit({
          type: "error",
          code: RerankErrorCode.INVALID_COMMAND,
          text: `Invalid rank command: ${parsed.detail}`,
        });
      } else {
        this.logger.warn(`Ignoring command: ${parsed.detail}`);
      }
      return;
    }

    const { command } = parsed;
    if (command.type === "load") {
      await this.load();
    } else {
      await this.rank(command);
    }
  }

  /**
   * Idempotent. A load already in flight is joined rather than repeated; a
   * failed load leaves the engine Unloaded so it can be tried again.
   */
  async load(): Promise<void> {
    if (this.model) {
      this.eventSink.emit({ type: "model-ready" });
      return;
    }
    if (this.loading) {
      return this.loading;
    }

    this.loading = this.performLoad().finally(() => {
      this.loading = null;
    });
    return this.loading;
  }

  async rank(command: RankCommand): Promise<void> {
    if (!this.model || !this.engineState.isReady()) {
      this.logger.warn(
        `Rank request #${command.requestId} arrived before the model was ready`,
      );
      this.eventSink.emit({
        type: "status",
        text: `Model is not ready; ignoring rank request #${command.requestId}.`,
      });
      return;
    }

    const latest = this.ranker.getLatestRequestId();
    if (command.requestId <= latest) {
      this.logger.warn(
        `Ignoring rank request #${command.requestId}; #${latest} was already accepted`,
      );
      return;
    }

    await this.ranker.rank(command, this.model);
  }

  private async performLoad(): Promise<void> {
    this.engineState.setState(EngineState.LOADING);
    try {
      this.model = await this.assetLoader.load((text) =>
        this.eventSink.emit({ type: "status", text }),
      );
      this.engineState.setState(EngineState.READY);
      this.eventSink.emit({ type: "model-ready" });
    } catch (error) {
      this.engineState.setState(EngineState.UNLOADED);
      const normalized = ErrorNormalizer.normalize(error);
      this.logger.error(
        `Model load failed: ${normalized.message}`,
        normalized.stack,
      );
      this.eventSink.emit({
        type: "error",
        code: normalized.code,
        text: normalized.message,
      });
    }
  }
}
