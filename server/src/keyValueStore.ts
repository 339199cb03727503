/** Durable string-keyed storage behind the override ledger. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  async get(key: string) { return this.entries.get(key) ?? null; }
  async set(key: string, value: string) { this.entries.set(key, value); }
  async delete(key: string) { this.entries.delete(key); }

  snapshot() { return Object.fromEntries(this.entries); }
}
