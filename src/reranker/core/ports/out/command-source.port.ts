import { Observable } from "rxjs";

/**
 * Engine side of the command channel (host → engine).
 *
 * Messages are untyped here; the engine validates them before acting.
 */
export abstract class CommandSourcePort {
  abstract commands(): Observable<unknown>;
}
