import { EngineState } from "@reranker/domain";
import { RankCommand } from "@reranker/dtos";

/**
 * Inbound port of the engine.
 */
export abstract class RerankEngineUseCase {
  /**
   * Validates a raw message from the command channel and routes it.
   */
  abstract dispatch(raw: unknown): Promise<void>;

  /**
   * Loads the model once. Later calls report readiness without fetching.
   */
  abstract load(): Promise<void>;

  /**
   * Scores a request incrementally, emitting snapshots until it completes
   * or a newer request supersedes it.
   */
  abstract rank(command: RankCommand): Promise<void>;

  abstract getState(): EngineState;
}
