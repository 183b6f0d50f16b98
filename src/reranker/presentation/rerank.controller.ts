import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  MessageEvent,
  Post,
  Sse,
} from "@nestjs/common";
import { map, Observable } from "rxjs";
import { RerankRequestDto } from "@reranker/dtos";
import { RerankHostService, RerankStatus } from "@reranker/service";

@Controller("rerank")
export class RerankController {
  private readonly logger = new Logger(RerankController.name);

  constructor(private readonly hostService: RerankHostService) {}

  @Post("load")
  @HttpCode(HttpStatus.ACCEPTED)
  load(): { accepted: true } {
    this.hostService.requestLoad();
    return { accepted: true };
  }

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  rank(@Body() body: RerankRequestDto): { requestId: number } {
    const documents = body.documents.map((document) => ({ ...document }));
    const requestId = this.hostService.submitRank(body.query, documents);
    this.logger.log(
      `Accepted rank request #${requestId} (${documents.length} documents)`,
    );
    return { requestId };
  }

  @Get("status")
  status(): RerankStatus {
    return this.hostService.getStatus();
  }

  /**
   * Server-sent events; each message is named after the engine event type.
   */
  @Sse("events")
  events(): Observable<MessageEvent> {
    return this.hostService
      .events()
      .pipe(map((event) => ({ type: event.type, data: event })));
  }
}
