import { DynamicModule, Module } from "@nestjs/common";
import { EngineTransport } from "@config";
import { ControlChannelPort } from "@reranker/out-ports";
import { RerankHostService } from "@reranker/service";
import {
  InlineControlChannel,
  WorkerControlChannel,
} from "@reranker/infrastructure";
import { RerankController } from "@reranker/presentation";
import { RerankEngineModule } from "./rerank-engine.module";

export interface RerankerModuleOptions {
  transport: EngineTransport;
}

/**
 * RerankerModule - host side: HTTP surface, request ids and the channel to
 * the engine. With the inline transport the engine runs in this process;
 * with the worker transport it runs in a worker thread of its own.
 */
@Module({})
export class RerankerModule {
  static register(options: RerankerModuleOptions): DynamicModule {
    if (options.transport === "worker") {
      return {
        module: RerankerModule,
        controllers: [RerankController],
        providers: [
          WorkerControlChannel,
          { provide: ControlChannelPort, useExisting: WorkerControlChannel },
          RerankHostService,
        ],
        exports: [RerankHostService],
      };
    }

    return {
      module: RerankerModule,
      imports: [RerankEngineModule.forChannel(InlineControlChannel)],
      controllers: [RerankController],
      providers: [
        { provide: ControlChannelPort, useExisting: InlineControlChannel },
        RerankHostService,
      ],
      exports: [RerankHostService],
    };
  }
}
