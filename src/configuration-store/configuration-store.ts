/**
 * Configuration provider interfaces
 *
 * The engine reads every rollout and eligibility setting through an {@link IConfigProvider}
 * on each call, so a change made by any replica takes effect on the next evaluation.
 *
 * Reads must be synchronous to keep the decision path non-suspending. Stores that can
 * only be reached asynchronously (Redis, a database) are placed behind a synchronous
 * serving store:
 *
 * - SyncStore: in-memory map that answers reads
 * - AsyncStore: shared persistent store that receives writes and is reloaded periodically
 */
export interface IConfigProvider {
  getString(key: string, defaultValue: string): string;
  getInt(key: string, defaultValue: number): number;
  getBoolean(key: string, defaultValue: boolean): boolean;
  setString(key: string, value: string): void;
}

export interface ISyncStore<T> {
  get(key: string): T | null;
  getKeys(): string[];
  isInitialized(): boolean;
  set(key: string, value: T): void;
  setEntries(entries: Record<string, T>): void;
}

export interface IAsyncStore<T> {
  isInitialized(): boolean;
  getEntries(): Promise<Record<string, T>>;
  /** Writes the given entries, leaving other keys untouched. */
  setEntries(entries: Record<string, T>): Promise<void>;
}

const INTEGER_PATTERN = /^\s*[-+]?\d+\s*$/;

export function parseIntValue(raw: string | null, defaultValue: number): number {
  if (raw === null || !INTEGER_PATTERN.test(raw)) {
    return defaultValue;
  }
  return parseInt(raw, 10);
}

export function parseBooleanValue(raw: string | null, defaultValue: boolean): boolean {
  switch (raw?.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return defaultValue;
  }
}

export abstract class AbstractConfigProvider implements IConfigProvider {
  protected abstract read(key: string): string | null;

  abstract setString(key: string, value: string): void;

  getString(key: string, defaultValue: string): string {
    return this.read(key) ?? defaultValue;
  }

  getInt(key: string, defaultValue: number): number {
    return parseIntValue(this.read(key), defaultValue);
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    return parseBooleanValue(this.read(key), defaultValue);
  }
}
