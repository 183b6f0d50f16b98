import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { validateSync } from "class-validator";
import { LoggerPort } from "@logging/out-ports";
import { Latency, RankEvent, RankSummary } from "@logging/domain";
import { LoggingStats, LoggingUseCase } from "../core/ports/in";
import { ErrorNormalizer } from "../presentation/normalizers/error.normalizer";

/**
 * LoggingService - builds RankEvents from engine summaries and hands them
 * to the LoggerPort.
 *
 * Writes are fire-and-forget from the caller's point of view. A bounded
 * number may be pending at once; beyond that events are dropped and
 * counted (backpressure), so a slow disk can never stall the ranker.
 */
@Injectable()
export class LoggingService extends LoggingUseCase {
  private readonly serviceLogger = new Logger(LoggingService.name);
  private readonly serviceName: string;
  private readonly maxPendingWrites: number;

  private pendingWrites = 0;
  private droppedCount = 0;
  private recordedCount = 0;

  constructor(
    private readonly logger: LoggerPort,
    private readonly configService: ConfigService,
  ) {
    super();
    this.serviceName =
      this.configService.get<string>("SERVICE_NAME") || "reranker";
    this.maxPendingWrites = parseInt(
      this.configService.get<string>("LOG_MAX_PENDING_WRITES") || "500",
      10,
    );
  }

  override recordRank(summary: RankSummary): void {
    if (this.pendingWrites >= this.maxPendingWrites) {
      this.droppedCount++;
      if (this.droppedCount % 100 === 1) {
        // Log warning periodically, not every time
        this.serviceLogger.warn(
          `Backpressure active: dropped ${this.droppedCount} rank events. ` +
            `Pending: ${this.pendingWrites}/${this.maxPendingWrites}`,
        );
      }
      return;
    }

    const event = new RankEvent({
      ...summary,
      timestamp: new Date().toISOString(),
      service: this.serviceName,
      latencyBucket: Latency.getBucket(summary.durationMs),
    });

    const violations = validateSync(event);
    if (violations.length > 0) {
      this.serviceLogger.warn(
        `Discarding invalid rank event for request #${summary.requestId}: ` +
          violations.map((v) => v.property).join(", "),
      );
      return;
    }

    this.pendingWrites++;
    this.logger
      .log(event)
      .then(() => {
        this.recordedCount++;
      })
      .catch((error: unknown) => {
        const normalized = ErrorNormalizer.normalize(error);
        this.serviceLogger.error(
          `Failed to persist rank event #${event.requestId}: ${normalized.message}`,
        );
      })
      .finally(() => {
        this.pendingWrites--;
      });
  }

  override getStats(): LoggingStats {
    return {
      recordedCount: this.recordedCount,
      droppedCount: this.droppedCount,
      pendingWrites: this.pendingWrites,
      maxPendingWrites: this.maxPendingWrites,
    };
  }
}
