import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { loadRerankConfig, pathConfig, rerankConfig } from "@config";
import { LoggingModule } from "@logging";
import { RerankerModule } from "@reranker";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: [pathConfig, rerankConfig],
    }),
    LoggingModule,
    RerankerModule.register({ transport: loadRerankConfig().transport }),
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
