import { RankEvent } from "@logging/domain";

/**
 * Logger port - defines the contract for wide event storage.
 * This contract must not change, even when storage changes.
 */
export abstract class LoggerPort {
  abstract log(event: RankEvent): Promise<void>;
}
