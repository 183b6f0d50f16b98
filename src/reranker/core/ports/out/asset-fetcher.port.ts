/**
 * Outbound port for retrieving one asset URL.
 *
 * Implementations throw AssetRequestError so the loader can tell a
 * transient failure from a permanent one.
 */
export abstract class AssetFetcherPort {
  abstract fetch(url: string, timeoutMs: number): Promise<Uint8Array>;
}
