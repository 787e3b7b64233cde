export const KV_STORE = 'KV_STORE';

/**
 * Minimal persistence contract. Each key holds one JSON document, so a single
 * `set` is the unit of atomicity for a record.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  /** Keys starting with `prefix`, in no particular order. */
  keys(prefix: string): Promise<string[]>;
}
