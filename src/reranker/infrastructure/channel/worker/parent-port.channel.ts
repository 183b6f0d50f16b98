import { Inject, Injectable } from "@nestjs/common";
import { Observable } from "rxjs";
import { MessagePort } from "worker_threads";
import { EngineEvent } from "@reranker/dtos";
import { CommandSourcePort, EventSinkPort } from "@reranker/out-ports";

export const ENGINE_PARENT_PORT = Symbol("ENGINE_PARENT_PORT");

/**
 * ParentPortChannel - engine side of the worker transport.
 *
 * Commands arrive as structured-clone messages from the host thread. The
 * port's Node `message` listener hands over the payload itself; commands
 * are validated by the engine, not here.
 */
@Injectable()
export class ParentPortChannel implements CommandSourcePort, EventSinkPort {
  private readonly port: MessagePort;
  private readonly commands$: Observable<unknown>;

  constructor(@Inject(ENGINE_PARENT_PORT) port: MessagePort | null) {
    if (!port) {
      throw new Error("ParentPortChannel must run inside a worker thread");
    }
    this.port = port;
    this.commands$ = new Observable<unknown>((subscriber) => {
      const onMessage = (message: unknown) => subscriber.next(message);
      port.on("message", onMessage);
      return () => {
        port.off("message", onMessage);
      };
    });
  }

  commands(): Observable<unknown> {
    return this.commands$;
  }

  emit(event: EngineEvent): void {
    this.port.postMessage(event);
  }
}
