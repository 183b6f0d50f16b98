import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { EngineCommand } from "./engine-command";
import { RankCommandDto } from "./rank-command.dto";

export type ParsedCommand =
  | { ok: true; command: EngineCommand }
  | { ok: false; reason: "unknown" | "invalid"; detail: string };

/**
 * Turns whatever arrived on the command channel into a typed command.
 *
 * Documents are shallow-copied so the engine never holds the host's
 * objects; their fields and field order are preserved.
 */
export function parseEngineCommand(raw: unknown): ParsedCommand {
  if (typeof raw !== "object" || raw === null || !("type" in raw)) {
    return { ok: false, reason: "unknown", detail: "message has no type" };
  }

  if (raw.type === "load") {
    return { ok: true, command: { type: "load" } };
  }

  if (raw.type !== "rank") {
    return {
      ok: false,
      reason: "unknown",
      detail: `unknown command type '${String(raw.type)}'`,
    };
  }

  const dto = plainToInstance(RankCommandDto, raw);
  const violations = validateSync(dto);
  if (violations.length > 0) {
    return {
      ok: false,
      reason: "invalid",
      detail: violations
        .map((v) => `${v.property}: ${Object.values(v.constraints ?? {}).join(", ") || "invalid nested value"}`)
        .join("; "),
    };
  }

  return {
    ok: true,
    command: {
      type: "rank",
      requestId: dto.requestId,
      queryText: dto.queryText,
      documents: dto.documents.map((document) => ({ ...document })),
    },
  };
}
