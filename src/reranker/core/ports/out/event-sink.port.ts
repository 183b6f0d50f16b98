import { EngineEvent } from "@reranker/dtos";

/**
 * Engine side of the event channel (engine → host).
 */
export abstract class EventSinkPort {
  abstract emit(event: EngineEvent): void;
}
