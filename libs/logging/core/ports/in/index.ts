export { LoggingUseCase } from "./logging.use-case";
export type { LoggingStats } from "./logging.use-case";
