/**
 * Outbound port for the persistent asset cache.
 *
 * Keys are exact URL strings. Implementations namespace them with the
 * configured cache namespace so incompatible cache generations never mix.
 * Entries are written once and never evicted by the engine.
 */
export abstract class AssetCachePort {
  /**
   * Returns the cached bytes for `url`, or null on a miss.
   */
  abstract get(url: string): Promise<Uint8Array | null>;

  /**
   * Stores `bytes` under `url`. An existing entry is left as it is.
   */
  abstract put(url: string, bytes: Uint8Array): Promise<void>;
}
