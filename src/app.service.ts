import { Injectable } from "@nestjs/common";
import { LoggingStats, LoggingUseCase } from "@logging";
import { HostEngineStatus, RerankHostService } from "@reranker/service";

export interface HealthReport {
  status: string;
  engine: HostEngineStatus;
  wideEvents: LoggingStats;
}

@Injectable()
export class AppService {
  constructor(
    private readonly hostService: RerankHostService,
    private readonly loggingService: LoggingUseCase,
  ) {}

  getHealth(): HealthReport {
    return {
      status: "ok",
      engine: this.hostService.getStatus().engine,
      wideEvents: this.loggingService.getStats(),
    };
  }
}
