import { RankDocument } from "@reranker/domain";

export interface LoadCommand {
  type: "load";
}

export interface RankCommand {
  type: "rank";
  requestId: number;
  queryText: string;
  documents: RankDocument[];
}

/**
 * Commands travelling host → engine.
 */
export type EngineCommand = LoadCommand | RankCommand;
