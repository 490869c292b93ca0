import type { ProtocolClient } from './client/protocol-client';
import { Logger } from './logging';
import { errorMessage, pause } from './utils';

const log = Logger.get('sync-task');

export interface SyncTaskOptions {
  timeoutMs: number;
  /** pause after a successful round */
  yieldMs: number;
  /** pause after a failed round */
  backoffMs: number;
}

/**
 * Keeps one user's client synchronized until stopped, so bridge messages keep
 * flowing to the client's listeners. Errors never end the loop.
 */
export class SyncTask {
  private readonly controller = new AbortController();

  private running?: Promise<void>;

  public rounds = 0;

  public failures = 0;

  constructor(
    private readonly client: ProtocolClient,
    private readonly userId: number,
    private readonly options: SyncTaskOptions
  ) {}

  public start(): this {
    this.running ??= this.loop();
    return this;
  }

  public stop() {
    this.controller.abort();
  }

  public get stopped() {
    return this.controller.signal.aborted;
  }

  /** Resolves once the loop has exited. */
  public async done() {
    await this.running;
  }

  private async loop() {
    const { signal } = this.controller;

    log.info('Starting sync for user %s', this.userId);

    while (!signal.aborted) {
      try {
        await this.client.syncOnce({
          timeoutMs: this.options.timeoutMs,
          fullState: true,
          signal,
          deliver: true,
        });

        this.rounds += 1;

        await pause(this.options.yieldMs, signal);
      } catch (err) {
        if (signal.aborted) break;

        this.failures += 1;

        log.error('Sync failed for user %s: %s', this.userId, errorMessage(err));

        await pause(this.options.backoffMs, signal);
      }
    }

    log.info('Stopped sync for user %s', this.userId);
  }
}
