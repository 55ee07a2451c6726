/**
 * Storage behind the analytics cache. Values are whole serialized strings so
 * a reader sees either a complete entry or none.
 */
export interface AnalyticsCacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}
