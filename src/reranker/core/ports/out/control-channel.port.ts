import { Observable } from "rxjs";
import { EngineCommand, EngineEvent } from "@reranker/dtos";

/**
 * Host side of the control channel: commands go out, events come back.
 * The transport behind it may be in-process or a worker thread.
 */
export abstract class ControlChannelPort {
  abstract send(command: EngineCommand): void;

  abstract events(): Observable<EngineEvent>;
}
