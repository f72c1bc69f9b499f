/**
 * Keyed string cache with per-entry TTL. Values are serialized by the caller.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export const CACHE_STORE = 'CACHE_STORE';
