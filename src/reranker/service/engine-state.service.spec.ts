import { EngineState } from "@reranker/domain";
import { EngineStateService } from "./engine-state.service";

describe("EngineStateService", () => {
  let service: EngineStateService;

  beforeEach(() => {
    service = new EngineStateService();
  });

  it("should start unloaded", () => {
    expect(service.getState()).toBe(EngineState.UNLOADED);
    expect(service.isReady()).toBe(false);
  });

  it("should move through loading to ready", () => {
    service.setState(EngineState.LOADING);
    service.setState(EngineState.READY);

    expect(service.isReady()).toBe(true);
  });

  it("should allow a failed load to return to unloaded", () => {
    service.setState(EngineState.LOADING);
    service.setState(EngineState.UNLOADED);

    expect(service.getState()).toBe(EngineState.UNLOADED);
  });

  it("should refuse to skip loading", () => {
    expect(() => service.setState(EngineState.READY)).toThrow();
  });

  it("should never leave ready", () => {
    service.setState(EngineState.LOADING);
    service.setState(EngineState.READY);

    expect(() => service.setState(EngineState.UNLOADED)).toThrow();
  });
});
