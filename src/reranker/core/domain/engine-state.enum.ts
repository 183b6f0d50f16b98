/**
 * EngineState - lifecycle of the model handle.
 *
 * UNLOADED: no handle; a failed load also returns here
 * LOADING: assets are being fetched and the handle built
 * READY: rank commands are accepted
 */
export enum EngineState {
  UNLOADED = "UNLOADED",
  LOADING = "LOADING",
  READY = "READY",
}
