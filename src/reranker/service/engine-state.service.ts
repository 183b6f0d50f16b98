import { Injectable, Logger } from "@nestjs/common";
import { EngineState } from "@reranker/domain";

const ALLOWED_TRANSITIONS: Record<EngineState, readonly EngineState[]> = {
  [EngineState.UNLOADED]: [EngineState.LOADING],
  [EngineState.LOADING]: [EngineState.READY, EngineState.UNLOADED],
  [EngineState.READY]: [],
};

/**
 * EngineStateService - holds the engine lifecycle state.
 *
 * UNLOADED → LOADING → READY, with LOADING → UNLOADED when a load fails so
 * the host can send `load` again. READY lasts for the engine lifetime.
 */
@Injectable()
export class EngineStateService {
  private readonly logger = new Logger(EngineStateService.name);
  private state: EngineState = EngineState.UNLOADED;

  getState(): EngineState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === EngineState.READY;
  }

  /**
   * Move to `next`. Transitions outside the lifecycle throw; setting the
   * current state again is a no-op.
   */
  setState(next: EngineState): void {
    if (this.state === next) return;

    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(
        `Illegal engine state transition: ${this.state} → ${next}`,
      );
    }

    const previous = this.state;
    this.state = next;
    this.logger.log(`Engine state changed: ${previous} → ${next}`);
  }
}
