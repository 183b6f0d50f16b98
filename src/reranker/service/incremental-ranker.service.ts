import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { setImmediate as yieldToScheduler, setTimeout as delay } from "timers/promises";
import { RERANK_CONFIG_KEY, RerankConfig } from "@config";
import { ErrorNormalizer, LoggingUseCase } from "@logging";
import { RankOutcome } from "@logging/value-objects";
import {
  combineScorableText,
  RankDocument,
  RankingProgress,
  SimilarityModel,
} from "@reranker/domain";
import { RankCommand } from "@reranker/dtos";
import { EventSinkPort } from "@reranker/out-ports";
import { DocumentScoringError } from "@reranker/value-objects";

/**
 * IncrementalRankerService - scores one request at a time, newest wins.
 *
 * Every candidate costs one trip through the event loop so a newer request
 * (or any other command) can be picked up in between. A request that is no
 * longer the latest stops at the next check without emitting anything else.
 */
@Injectable()
export class IncrementalRankerService {
  private readonly logger = new Logger(IncrementalRankerService.name);
  private readonly cutoff: number;
  private readonly scoreTimeoutMs: number;
  private latestRequestId = 0;

  constructor(
    private readonly eventSink: EventSinkPort,
    private readonly loggingService: LoggingUseCase,
    private readonly configService: ConfigService,
  ) {
    const config = this.configService.getOrThrow<RerankConfig>(RERANK_CONFIG_KEY);
    this.cutoff = config.cutoff;
    this.scoreTimeoutMs = config.scoreTimeoutMs;
  }

  getLatestRequestId(): number {
    return this.latestRequestId;
  }

  isLatest(requestId: number): boolean {
    return requestId === this.latestRequestId;
  }

  async rank(command: RankCommand, model: SimilarityModel): Promise<void> {
    const { requestId, queryText } = command;
    const startTime = Date.now();
    this.latestRequestId = requestId;

    const progress = new RankingProgress(command.documents, this.cutoff);
    this.logger.debug(
      `Request #${requestId}: ${progress.eligibleCount} of ${progress.candidateCount} candidates eligible`,
    );

    for (let item = progress.next(); item; item = progress.next()) {
      await yieldToScheduler();
      if (!this.isLatest(requestId)) {
        this.finish(requestId, RankOutcome.SUPERSEDED, progress, startTime);
        return;
      }

      const { document, position } = item;
      try {
        const score = await this.score(model, queryText, document);
        progress.recordScore(document, position, score);
      } catch (error) {
        progress.recordFailure(document);
        this.logger.warn(ErrorNormalizer.messageOf(error));
      }

      if (!this.isLatest(requestId)) {
        this.finish(requestId, RankOutcome.SUPERSEDED, progress, startTime);
        return;
      }
      this.eventSink.emit({
        type: "rank-update",
        requestId,
        snapshot: progress.snapshot(),
      });
    }

    if (!this.isLatest(requestId)) {
      this.finish(requestId, RankOutcome.SUPERSEDED, progress, startTime);
      return;
    }
    this.eventSink.emit({
      type: "rank-complete",
      requestId,
      snapshot: progress.snapshot(),
    });
    this.finish(requestId, RankOutcome.COMPLETED, progress, startTime);
  }

  /**
   * Scores one document, bounded by the scoring timeout. Anything other
   * than a finite number is a failure for that document.
   */
  private async score(
    model: SimilarityModel,
    queryText: string,
    document: RankDocument,
  ): Promise<number> {
    const timeout = new AbortController();
    try {
      const score = await Promise.race([
        Promise.resolve(model.similarity(queryText, combineScorableText(document))),
        delay(this.scoreTimeoutMs, undefined, { signal: timeout.signal }).then(
          () => {
            throw new DocumentScoringError(
              document.id,
              `timed out after ${this.scoreTimeoutMs}ms`,
            );
          },
        ),
      ]);
      if (typeof score !== "number" || !Number.isFinite(score)) {
        throw new DocumentScoringError(document.id, `non-finite score ${String(score)}`);
      }
      return score;
    } catch (error) {
      if (error instanceof DocumentScoringError) throw error;
      throw new DocumentScoringError(document.id, ErrorNormalizer.messageOf(error), {
        cause: error,
      });
    } finally {
      timeout.abort();
    }
  }

  private finish(
    requestId: number,
    outcome: RankOutcome,
    progress: RankingProgress,
    startTime: number,
  ): void {
    if (outcome === RankOutcome.SUPERSEDED) {
      this.logger.debug(
        `Request #${requestId} superseded by #${this.latestRequestId}`,
      );
    }
    this.loggingService.recordRank({
      requestId,
      outcome,
      candidates: progress.candidateCount,
      eligible: progress.eligibleCount,
      scored: progress.scoredCount,
      failed: progress.failedCount,
      durationMs: Date.now() - startTime,
    });
  }
}
