import { isEngineEvent, requestIdOf } from "./engine-event";

describe("isEngineEvent", () => {
  it("should accept every event type", () => {
    expect(isEngineEvent({ type: "status", text: "Downloading config.json..." })).toBe(true);
    expect(isEngineEvent({ type: "model-ready" })).toBe(true);
    expect(isEngineEvent({ type: "rank-update", requestId: 1, snapshot: [] })).toBe(true);
    expect(isEngineEvent({ type: "rank-complete", requestId: 1, snapshot: [] })).toBe(true);
    expect(isEngineEvent({ type: "error", code: "X", text: "y" })).toBe(true);
  });

  it("should reject malformed values", () => {
    expect(isEngineEvent(undefined)).toBe(false);
    expect(isEngineEvent({ type: "rank" })).toBe(false);
    expect(isEngineEvent({ type: "rank-update", requestId: 1 })).toBe(false);
  });
});

describe("requestIdOf", () => {
  it("should return the id of ranking events only", () => {
    expect(requestIdOf({ type: "rank-complete", requestId: 4, snapshot: [] })).toBe(4);
    expect(requestIdOf({ type: "model-ready" })).toBeNull();
  });
});
