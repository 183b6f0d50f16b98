export type { EngineCommand, LoadCommand, RankCommand } from "./engine-command";
export { isEngineEvent, requestIdOf } from "./engine-event";
export type {
  EngineEvent,
  StatusEvent,
  ModelReadyEvent,
  RankUpdateEvent,
  RankCompleteEvent,
  EngineErrorEvent,
} from "./engine-event";
export { RankDocumentDto } from "./rank-document.dto";
export { RankCommandDto } from "./rank-command.dto";
export { RerankRequestDto } from "./rerank-request.dto";
export { parseEngineCommand } from "./command.parser";
export type { ParsedCommand } from "./command.parser";
