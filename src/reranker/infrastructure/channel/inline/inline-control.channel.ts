import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { Observable, Subject } from "rxjs";
import { EngineCommand, EngineEvent } from "@reranker/dtos";
import {
  CommandSourcePort,
  ControlChannelPort,
  EventSinkPort,
} from "@reranker/out-ports";

/**
 * InlineControlChannel - both ends of the control channel in one process.
 *
 * The host sees it as a ControlChannelPort, the engine as a
 * CommandSourcePort and an EventSinkPort. Delivery is synchronous and in
 * emission order.
 */
@Injectable()
export class InlineControlChannel
  extends ControlChannelPort
  implements CommandSourcePort, EventSinkPort, OnModuleDestroy
{
  private readonly commands$ = new Subject<unknown>();
  private readonly events$ = new Subject<EngineEvent>();

  send(command: EngineCommand): void {
    this.commands$.next(command);
  }

  events(): Observable<EngineEvent> {
    return this.events$.asObservable();
  }

  commands(): Observable<unknown> {
    return this.commands$.asObservable();
  }

  emit(event: EngineEvent): void {
    this.events$.next(event);
  }

  onModuleDestroy(): void {
    this.commands$.complete();
    this.events$.complete();
  }
}
