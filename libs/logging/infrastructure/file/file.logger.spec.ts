import { ConfigService } from "@nestjs/config";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { RankEvent } from "@logging/domain";
import { LatencyBucket, RankOutcome } from "@logging/value-objects";
import { FileLogger } from "./file.logger";

describe("FileLogger", () => {
  let directory: string;
  let logger: FileLogger;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "rank-events-"));
    logger = new FileLogger(
      new ConfigService({ LOG_FILE_PATH: join(directory, "nested", "events.log") }),
    );
    await logger.onModuleInit();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should append events as JSON lines", async () => {
    const event = new RankEvent({
      requestId: 1,
      timestamp: "2026-01-01T00:00:00.000Z",
      service: "reranker",
      outcome: RankOutcome.SUPERSEDED,
      candidates: 3,
      eligible: 3,
      scored: 1,
      failed: 0,
      durationMs: 12,
      latencyBucket: LatencyBucket.P_SUB_50MS,
    });

    await logger.log(event);
    await logger.log(new RankEvent({ ...event, requestId: 2 }));

    const lines = (await readFile(logger.getFilePath(), "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({
      requestId: 1,
      timestamp: "2026-01-01T00:00:00.000Z",
      service: "reranker",
      outcome: "SUPERSEDED",
      candidates: 3,
      eligible: 3,
      scored: 1,
      failed: 0,
      durationMs: 12,
      latencyBucket: "P_SUB_50MS",
    });
    expect(JSON.parse(lines[1]).requestId).toBe(2);
  });
});
