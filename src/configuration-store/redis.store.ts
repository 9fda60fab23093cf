import { CONFIG_KEYS } from '../constants';
import { IKeyValueClient } from '../key-value-client';

import { IAsyncStore } from './configuration-store';

/** Keeps one Redis string per configuration key. */
export class RedisConfigStore implements IAsyncStore<string> {
  private initialized = false;

  constructor(
    private readonly client: IKeyValueClient,
    private readonly keys: readonly string[] = CONFIG_KEYS,
  ) {}

  isInitialized(): boolean {
    return this.initialized;
  }

  async getEntries(): Promise<Record<string, string>> {
    const values = await Promise.all(this.keys.map((key) => this.client.get(key)));
    const entries: Record<string, string> = {};
    this.keys.forEach((key, i) => {
      const value = values[i];
      if (value !== null) {
        entries[key] = value;
      }
    });
    this.initialized = true;
    return entries;
  }

  async setEntries(entries: Record<string, string>): Promise<void> {
    await Promise.all(
      Object.entries(entries).map(([key, value]) => this.client.set(key, value)),
    );
    this.initialized = true;
  }
}
