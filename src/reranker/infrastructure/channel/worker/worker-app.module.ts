import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { parentPort } from "worker_threads";
import { pathConfig, rerankConfig } from "@config";
import { LoggingModule } from "@logging";
import { RerankEngineModule } from "../../../rerank-engine.module";
import { ENGINE_PARENT_PORT, ParentPortChannel } from "./parent-port.channel";

/**
 * Root module of the engine worker thread: configuration, wide-event
 * logging and the engine, talking to the host through the parent port.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: [pathConfig, rerankConfig],
    }),
    LoggingModule,
    RerankEngineModule.forChannel(ParentPortChannel, [
      { provide: ENGINE_PARENT_PORT, useValue: parentPort },
    ]),
  ],
})
export class WorkerAppModule {}
