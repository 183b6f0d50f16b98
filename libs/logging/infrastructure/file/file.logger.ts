import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { promises as fs } from "fs";
import { dirname, join } from "path";
import { LoggerPort } from "@logging/out-ports";
import { RankEvent } from "@logging/domain";
import { resolveProjectRoot } from "@config";

/**
 * FileLogger - appends RankEvents as JSON lines to a local file.
 * No business logic - pure I/O.
 */
@Injectable()
export class FileLogger extends LoggerPort implements OnModuleInit {
  private readonly logger = new Logger(FileLogger.name);
  private readonly logFilePath: string;

  constructor(private readonly configService: ConfigService) {
    super();
    this.logFilePath =
      this.configService.get<string>("LOG_FILE_PATH") ||
      join(resolveProjectRoot(), "logs", "rank-events.log");
  }

  async onModuleInit(): Promise<void> {
    await fs.mkdir(dirname(this.logFilePath), { recursive: true });
    this.logger.log(`Rank events will be appended to ${this.logFilePath}`);
  }

  async log(event: RankEvent): Promise<void> {
    const jsonLine = JSON.stringify(event) + "\n";
    await fs.appendFile(this.logFilePath, jsonLine, "utf8");
  }

  getFilePath(): string {
    return this.logFilePath;
  }
}
