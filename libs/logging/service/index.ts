export { LoggingService } from "./logging.service";
