import { Module, Global } from "@nestjs/common";
import { LoggingService } from "@logging/services";
import { FileLogger } from "@logging/infrastructure";
import { LoggerPort } from "@logging/out-ports";
import { LoggingUseCase } from "./core/ports/in";

/**
 * LoggingModule - NestJS module for the logging library.
 *
 * This module is marked as @Global() so it can be imported once in the root
 * module and used throughout the application without re-importing.
 */
@Global()
@Module({
  providers: [
    {
      provide: LoggerPort,
      useClass: FileLogger,
    },
    LoggingService,
    {
      provide: LoggingUseCase,
      useExisting: LoggingService,
    },
  ],
  exports: [LoggingService, LoggingUseCase],
})
export class LoggingModule {}
