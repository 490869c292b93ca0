import type { BridgeStore } from '../data-store';
import { Logger } from '../logging';
import type { ConnectionRegistry } from '../registry';
import { errorMessage, nowSeconds } from '../utils';
import { discardRecord } from './monitor';

const log = Logger.get('reaper');

export interface ReaperOptions {
  ttlSeconds: number;
  intervalMs: number;
  now?: () => number;
}

/**
 * Removes `connecting` records nobody is watching any more, e.g. those left
 * behind by a restart while a login was pending.
 */
export class Reaper {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly store: BridgeStore,
    private readonly registry: ConnectionRegistry,
    private readonly options: ReaperOptions
  ) {}

  public async sweep(): Promise<number> {
    const now = this.options.now?.() ?? nowSeconds();
    const cutoff = now - this.options.ttlSeconds;

    const stale = (await this.store.listByStatus('connecting')).filter(
      (record) =>
        record.createdAt <= cutoff && !this.registry.hasMonitor(record.userId, record.bridgeType)
    );

    let removed = 0;

    for (const record of stale) {
      try {
        const discarded = await discardRecord(
          this.store,
          record.userId,
          record.bridgeType,
          record.roomId,
          'connecting'
        );

        if (discarded) {
          removed += 1;
          log.info('Removed stale %s record for user %s', record.bridgeType, record.userId);
        }
      } catch (err) {
        log.error('Could not remove stale record for user %s: %s', record.userId, errorMessage(err));
      }
    }

    return removed;
  }

  public start() {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.sweep().catch((err) => log.error('Sweep failed: %s', errorMessage(err)));
    }, this.options.intervalMs);

    this.timer.unref();
  }

  public stop() {
    clearInterval(this.timer);
    this.timer = undefined;
  }
}
