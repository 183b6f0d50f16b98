import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { parentPort } from "worker_threads";
import { ErrorNormalizer } from "@logging";
import { WorkerAppModule } from "./worker-app.module";

const logger = new Logger("RerankWorker");

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(WorkerAppModule);
  // Keeps the worker alive until the host terminates it.
  parentPort?.once("close", () => {
    app.close().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${ErrorNormalizer.messageOf(error)}`);
    });
  });
  logger.log("Engine worker ready");
}

bootstrap().catch((error: unknown) => {
  logger.error(`Engine worker failed to start: ${ErrorNormalizer.messageOf(error)}`);
  process.exit(1);
});
