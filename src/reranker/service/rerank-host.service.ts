import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { Observable, Subject, Subscription } from "rxjs";
import { RankDocument } from "@reranker/domain";
import { EngineEvent, requestIdOf } from "@reranker/dtos";
import { ControlChannelPort } from "@reranker/out-ports";

export type HostEngineStatus = "idle" | "loading" | "ready" | "failed";

export interface RerankStatus {
  engine: HostEngineStatus;
  statusText: string | null;
  lastError: { code: string; text: string } | null;
  latestRequestId: number | null;
  snapshot: RankDocument[] | null;
  final: boolean;
}

/**
 * RerankHostService - the interactive side of the control channel.
 *
 * Hands out request ids, forwards commands and keeps the most recent
 * snapshot. Events belonging to a request older than the latest one are
 * dropped here as well, so a late message from the engine never overwrites
 * a newer result.
 */
@Injectable()
export class RerankHostService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RerankHostService.name);
  private readonly events$ = new Subject<EngineEvent>();
  private subscription: Subscription | null = null;

  private nextRequestId = 1;
  private latestRequestId: number | null = null;
  private engine: HostEngineStatus = "idle";
  private statusText: string | null = null;
  private lastError: { code: string; text: string } | null = null;
  private snapshot: RankDocument[] | null = null;
  private final = false;

  constructor(private readonly channel: ControlChannelPort) {}

  onModuleInit(): void {
    this.subscription = this.channel.events().subscribe({
      next: (event) => this.handleEvent(event),
      error: (error: unknown) => this.events$.error(error),
    });
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.events$.complete();
  }

  requestLoad(): void {
    if (this.engine !== "ready") {
      this.engine = "loading";
    }
    this.channel.send({ type: "load" });
  }

  /**
   * Submits a ranking request and returns the id its events will carry.
   */
  submitRank(queryText: string, documents: RankDocument[]): number {
    const requestId = this.nextRequestId++;
    this.latestRequestId = requestId;
    this.snapshot = null;
    this.final = false;
    this.channel.send({ type: "rank", requestId, queryText, documents });
    this.logger.debug(
      `Submitted rank request #${requestId} with ${documents.length} documents`,
    );
    return requestId;
  }

  getStatus(): RerankStatus {
    return {
      engine: this.engine,
      statusText: this.statusText,
      lastError: this.lastError,
      latestRequestId: this.latestRequestId,
      snapshot: this.snapshot,
      final: this.final,
    };
  }

  /**
   * Engine events with stale ranking results already filtered out.
   */
  events(): Observable<EngineEvent> {
    return this.events$.asObservable();
  }

  private handleEvent(event: EngineEvent): void {
    const requestId = requestIdOf(event);
    if (requestId !== null && requestId !== this.latestRequestId) {
      this.logger.debug(
        `Dropping ${event.type} for stale request #${requestId}`,
      );
      return;
    }

    switch (event.type) {
      case "status":
        this.statusText = event.text;
        break;
      case "model-ready":
        this.engine = "ready";
        this.lastError = null;
        break;
      case "error":
        if (this.engine === "loading") {
          this.engine = "failed";
        }
        this.lastError = { code: event.code, text: event.text };
        break;
      case "rank-update":
        this.snapshot = event.snapshot;
        break;
      case "rank-complete":
        this.snapshot = event.snapshot;
        this.final = true;
        break;
    }

    this.events$.next(event);
  }
}
