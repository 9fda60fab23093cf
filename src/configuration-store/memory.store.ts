import { AbstractConfigProvider, ISyncStore } from './configuration-store';

export class MemoryStore<T> implements ISyncStore<T> {
  private store: Record<string, T> = {};
  private initialized = false;

  get(key: string): T | null {
    return this.store[key] ?? null;
  }

  getKeys(): string[] {
    return Object.keys(this.store);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  set(key: string, value: T): void {
    // replace rather than mutate so readers never see a half-applied batch
    this.store = { ...this.store, [key]: value };
    this.initialized = true;
  }

  setEntries(entries: Record<string, T>): void {
    this.store = { ...entries };
    this.initialized = true;
  }
}

export class MemoryConfigProvider extends AbstractConfigProvider {
  private readonly servingStore = new MemoryStore<string>();

  constructor(initialEntries?: Record<string, string>) {
    super();
    if (initialEntries) {
      this.servingStore.setEntries(initialEntries);
    }
  }

  protected read(key: string): string | null {
    return this.servingStore.get(key);
  }

  setString(key: string, value: string): void {
    this.servingStore.set(key, value);
  }

  entries(): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const key of this.servingStore.getKeys()) {
      const value = this.servingStore.get(key);
      if (value !== null) {
        entries[key] = value;
      }
    }
    return entries;
  }
}
