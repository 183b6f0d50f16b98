import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { Observable, Subject } from "rxjs";
import { join } from "path";
import { Worker } from "worker_threads";
import { ErrorNormalizer } from "@logging";
import { EngineCommand, EngineEvent, isEngineEvent } from "@reranker/dtos";
import { ControlChannelPort } from "@reranker/out-ports";
import { RerankErrorCode } from "@reranker/value-objects";

/**
 * The part of a worker the channel talks to. Tests hand in an
 * EventEmitter that behaves the same way.
 */
export interface EngineWorkerHandle {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "exit", listener: (exitCode: number) => void): unknown;
  terminate(): Promise<number>;
}

/**
 * WorkerControlChannel - host side of the worker transport.
 *
 * Spawns the engine in a worker thread and relays structured-clone
 * messages both ways. A crashed or exited worker surfaces as an `error`
 * event; it is not restarted.
 */
@Injectable()
export class WorkerControlChannel
  extends ControlChannelPort
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(WorkerControlChannel.name);
  private readonly events$ = new Subject<EngineEvent>();
  private worker: EngineWorkerHandle | null = null;
  private stopping = false;

  onModuleInit(): void {
    const worker = this.spawn();
    worker.on("message", (value) => {
      if (isEngineEvent(value)) {
        this.events$.next(value);
      } else {
        this.logger.warn("Dropping malformed message from the engine worker");
      }
    });
    worker.on("error", (error) => {
      this.logger.error(
        `Engine worker failed: ${ErrorNormalizer.messageOf(error)}`,
        error.stack,
      );
      this.events$.next({
        type: "error",
        code: RerankErrorCode.WORKER_FAILED,
        text: ErrorNormalizer.messageOf(error),
      });
    });
    worker.on("exit", (exitCode) => {
      this.worker = null;
      if (this.stopping) return;
      this.logger.error(`Engine worker exited with code ${exitCode}`);
      this.events$.next({
        type: "error",
        code: RerankErrorCode.WORKER_FAILED,
        text: `Engine worker exited with code ${exitCode}`,
      });
    });
    this.worker = worker;
    this.logger.log("Engine worker started");
  }

  async onModuleDestroy(): Promise<void> {
    this.stopping = true;
    const worker = this.worker;
    this.worker = null;
    if (worker) {
      await worker.terminate();
      this.logger.log("Engine worker terminated");
    }
    this.events$.complete();
  }

  send(command: EngineCommand): void {
    if (!this.worker) {
      this.logger.warn(`Engine worker is not running; dropping ${command.type}`);
      return;
    }
    this.worker.postMessage(command);
  }

  events(): Observable<EngineEvent> {
    return this.events$.asObservable();
  }

  /**
   * Starts the compiled worker entry that sits next to this file.
   */
  protected spawn(): EngineWorkerHandle {
    return new Worker(join(__dirname, "rerank.worker.js"), {
      env: process.env,
    });
  }
}
