import { logger, loggerPrefix } from '../application-logger';
import { DEFAULT_POLL_INTERVAL_MS } from '../constants';
import initPoller, { IPoller } from '../poller';

import { AbstractConfigProvider, IAsyncStore, ISyncStore } from './configuration-store';

/**
 * Answers reads from a synchronous serving store and writes through to a shared
 * persistent store. Values written by other replicas show up after the next
 * {@link HybridConfigProvider.refresh}.
 */
export class HybridConfigProvider extends AbstractConfigProvider {
  private pendingWrites: Promise<void> = Promise.resolve();
  // local writes made while a refresh is reading; each refresh replays its own on top of the snapshot
  private readonly writesDuringRefresh = new Set<Map<string, string>>();
  private poller?: IPoller;

  constructor(
    protected readonly servingStore: ISyncStore<string>,
    protected readonly persistentStore: IAsyncStore<string> | null,
  ) {
    super();
  }

  /**
   * Initialize the provider by loading the entries from the persistent store into the serving store.
   */
  async init(): Promise<void> {
    await this.refresh();
  }

  async refresh(): Promise<void> {
    if (!this.persistentStore) {
      return;
    }
    const localWrites = new Map<string, string>();
    this.writesDuringRefresh.add(localWrites);
    try {
      await this.pendingWrites;
      const entries = await this.persistentStore.getEntries();
      this.servingStore.setEntries({ ...entries, ...Object.fromEntries(localWrites) });
    } finally {
      this.writesDuringRefresh.delete(localWrites);
    }
  }

  startPolling(intervalMs: number = DEFAULT_POLL_INTERVAL_MS, maxPollRetries?: number) {
    this.stopPolling();
    this.poller = initPoller(intervalMs, () => this.refresh(), { maxPollRetries });
    this.poller.start();
  }

  stopPolling() {
    this.poller?.stop();
    this.poller = undefined;
  }

  /** Resolves once every write issued so far has reached the persistent store. */
  flush(): Promise<void> {
    return this.pendingWrites;
  }

  public isInitialized(): boolean {
    return this.servingStore.isInitialized() && (this.persistentStore?.isInitialized() ?? true);
  }

  protected read(key: string): string | null {
    return this.servingStore.get(key);
  }

  setString(key: string, value: string): void {
    this.servingStore.set(key, value);
    this.writesDuringRefresh.forEach((localWrites) => localWrites.set(key, value));
    const persistentStore = this.persistentStore;
    if (!persistentStore) {
      return;
    }
    this.pendingWrites = this.pendingWrites
      .then(() => persistentStore.setEntries({ [key]: value }))
      .catch((error) => {
        logger.error(
          { err: error, key },
          `${loggerPrefix} Failed to persist configuration value; it is only visible on this replica`,
        );
      });
  }
}
