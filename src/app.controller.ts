import { Controller, Get } from "@nestjs/common";
import { AppService, HealthReport } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get("health")
  getHealth(): HealthReport {
    return this.appService.getHealth();
  }
}
