import { parseEngineCommand } from "./command.parser";

describe("parseEngineCommand", () => {
  it("should accept a load command", () => {
    expect(parseEngineCommand({ type: "load" })).toEqual({
      ok: true,
      command: { type: "load" },
    });
  });

  it("should accept a rank command and keep extra document fields", () => {
    const document = { id: 7, title: "Ownership", tags: ["rust"], url: "/o" };

    const parsed = parseEngineCommand({
      type: "rank",
      requestId: 3,
      queryText: "borrowing",
      documents: [document],
    });

    expect(parsed).toEqual({
      ok: true,
      command: {
        type: "rank",
        requestId: 3,
        queryText: "borrowing",
        documents: [{ id: 7, title: "Ownership", tags: ["rust"], url: "/o" }],
      },
    });
    if (parsed.ok && parsed.command.type === "rank") {
      expect(parsed.command.documents[0]).not.toBe(document);
    }
  });

  it("should flag messages without a known type as unknown", () => {
    expect(parseEngineCommand(null)).toMatchObject({ ok: false, reason: "unknown" });
    expect(parseEngineCommand({ requestId: 1 })).toMatchObject({
      ok: false,
      reason: "unknown",
    });
    expect(parseEngineCommand({ type: "unload" })).toEqual({
      ok: false,
      reason: "unknown",
      detail: "unknown command type 'unload'",
    });
  });

  it("should reject a non-positive request id", () => {
    const parsed = parseEngineCommand({
      type: "rank",
      requestId: 0,
      queryText: "q",
      documents: [],
    });

    expect(parsed).toMatchObject({ ok: false, reason: "invalid" });
    if (!parsed.ok) {
      expect(parsed.detail).toContain("requestId");
    }
  });

  it("should reject documents with the wrong field types", () => {
    const parsed = parseEngineCommand({
      type: "rank",
      requestId: 1,
      queryText: "q",
      documents: [{ id: 1, tags: "not-a-list" }],
    });

    expect(parsed).toMatchObject({ ok: false, reason: "invalid" });
  });

  it("should reject a document without an id", () => {
    const parsed = parseEngineCommand({
      type: "rank",
      requestId: 1,
      queryText: "q",
      documents: [{ title: "no id" }],
    });

    expect(parsed).toMatchObject({ ok: false, reason: "invalid" });
  });
});
