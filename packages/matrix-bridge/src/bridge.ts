import { randomUUID } from 'node:crypto';
import type { ClientFactory, ProtocolClient } from './client/protocol-client';
import { DEFAULT_POLLING, type PollingConfig } from './constants';
import type { BridgeStore } from './data-store';
import { disconnect, type DisconnectResult } from './lifecycle/disconnector';
import { type MonitorContext, spawnMonitor } from './lifecycle/monitor';
import { negotiate } from './lifecycle/negotiator';
import { negotiateWithRetry } from './lifecycle/retry';
import { UserLock } from './lifecycle/user-lock';
import { Logger, type RequestLogger } from './logging';
import {
  type BridgeStatusView,
  type BridgeType,
  toStatusView,
} from './models/bridge-record';
import { ConfigurationError, MissingParameterError, NotConnectedError } from './models/errors';
import type { NetworkCatalog } from './models/network';
import { type PairingArtifact, type RawArtifact, toDataUrl } from './models/pairing';
import {
  BridgeEventRouter,
  type BridgeMessageHandler,
  LoggingMessageHandler,
} from './message-handler';
import { ClientSlot, type ConnectionRegistry } from './registry';
import type { SessionStore } from './session-store';
import { SyncTask } from './sync-task';
import { errorMessage, nowSeconds, sleep } from './utils';

const log = Logger.get('bridge-manager');

export interface BridgeManagerOptions {
  store: BridgeStore;
  registry: ConnectionRegistry;
  sessions: SessionStore;
  clients: ClientFactory;
  catalog: NetworkCatalog;
  bots: Partial<Record<BridgeType, string>>;
  downstream?: BridgeMessageHandler;
  polling?: Partial<PollingConfig>;
}

/**
 * Caller-facing operations of the connection lifecycle. One instance per
 * process; it owns the per-user setup lock and wires monitors to the registry.
 */
export class BridgeManager {
  public readonly router: BridgeEventRouter;

  public readonly polling: PollingConfig;

  private readonly locks = new UserLock();

  constructor(private readonly options: BridgeManagerOptions) {
    this.polling = { ...DEFAULT_POLLING, ...options.polling };

    this.router = new BridgeEventRouter({
      store: options.store,
      catalog: options.catalog,
      registry: options.registry,
      bots: options.bots,
      downstream: options.downstream ?? new LoggingMessageHandler(),
      maxAgeMs: this.polling.maxMessageAgeMs,
    });
  }

  /**
   * Starts pairing `bridgeType` for the user and returns what the user needs
   * to finish it. Confirmation is awaited in the background.
   */
  public async startConnection(
    userId: number,
    bridgeType: BridgeType,
    param?: string
  ): Promise<PairingArtifact> {
    const { catalog, store, sessions, clients } = this.options;

    const profile = catalog.get(bridgeType);
    const botUserId = this.botFor(bridgeType);

    if (profile.parameter && !param) throw new MissingParameterError(profile.parameter);

    return this.locks.run(userId, async () => {
      const reqLog = this.requestLog(userId, bridgeType);

      reqLog.info('Starting connection');

      if (await store.get(userId, bridgeType)) {
        reqLog.info('Replacing existing record');
        await disconnect(this.disconnectContext(), userId, bridgeType, reqLog);
      }

      const slot = new ClientSlot(await clients.getCachedClient(userId));

      const result = await negotiateWithRetry(
        slot,
        (client) => negotiate(client, { botUserId, profile, param, polling: this.polling, log: reqLog }),
        {
          userId,
          maxRetries: this.polling.maxRetries,
          retryDelayMs: this.polling.retryDelayMs,
          sessions,
          clients,
          log: reqLog,
        }
      );

      const artifact = await this.materialize(slot.current, result.artifact);

      await store.create({
        userId,
        bridgeType,
        status: 'connecting',
        roomId: result.roomId,
        createdAt: nowSeconds(),
      });

      spawnMonitor(this.monitorContext(), {
        client: slot.current,
        roomId: result.roomId,
        botUserId,
        userId,
        profile,
        log: reqLog,
      });

      reqLog.debug('Monitoring management room %s', result.roomId);

      return artifact;
    });
  }

  public async getStatus(userId: number, bridgeType: BridgeType): Promise<BridgeStatusView> {
    return toStatusView(await this.options.store.get(userId, bridgeType));
  }

  public async disconnect(userId: number, bridgeType: BridgeType): Promise<DisconnectResult> {
    return this.locks.run(userId, () =>
      disconnect(this.disconnectContext(), userId, bridgeType, this.requestLog(userId, bridgeType))
    );
  }

  /** Re-sends the network's sync commands for a connected bridge. */
  public async resync(userId: number, bridgeType: BridgeType): Promise<void> {
    const { store, catalog, clients } = this.options;

    const profile = catalog.get(bridgeType);
    const record = await store.get(userId, bridgeType);

    if (record?.status !== 'connected') throw new NotConnectedError(profile.displayName);

    const reqLog = this.requestLog(userId, bridgeType);
    const client = await clients.getCachedClient(userId);

    if (this.attach(userId, client)) await sleep(this.polling.resyncStartupDelayMs);

    for (const [index, command] of profile.resyncCommands.entries()) {
      if (index > 0) await sleep(profile.resyncDelayMs);

      await client.sendText(record.roomId, command);
    }

    reqLog.info('Sent %s resync commands', profile.resyncCommands.length);
  }

  /** Reattaches every user with a connected bridge. Returns how many succeeded. */
  public async restoreConnected(): Promise<number> {
    const { store, clients } = this.options;

    const users = new Set((await store.listByStatus('connected')).map((record) => record.userId));

    let restored = 0;

    for (const userId of users) {
      try {
        this.attach(userId, await clients.getClient(userId));
        restored += 1;
      } catch (err) {
        log.error('Could not restore sync for user %s: %s', userId, errorMessage(err));
      }
    }

    log.info('Restored %s of %s connected users', restored, users.size);

    return restored;
  }

  /** Registers the client as the user's live client with a sync task. */
  public attach(userId: number, client: ProtocolClient): boolean {
    return this.options.registry.attach(
      userId,
      client,
      async (message) => {
        await this.router.route(userId, message);
      },
      (attached) =>
        new SyncTask(attached, userId, {
          timeoutMs: this.polling.persistentSyncTimeoutMs,
          yieldMs: this.polling.syncYieldMs,
          backoffMs: this.polling.syncBackoffMs,
        })
    );
  }

  public shutdown() {
    this.options.registry.stopAll();
  }

  private async materialize(client: ProtocolClient, artifact: RawArtifact): Promise<PairingArtifact> {
    if (artifact.kind !== 'qr') return artifact;

    const media = await client.downloadMedia(artifact.mxcUrl);

    return { kind: 'qr', dataUrl: toDataUrl(media.data, artifact.mimetype ?? media.contentType) };
  }

  private botFor(bridgeType: BridgeType) {
    const bot = this.options.bots[bridgeType];

    if (!bot) throw new ConfigurationError(`No bridge bot configured for ${bridgeType}`);

    return bot;
  }

  private requestLog(userId: number, network: BridgeType): RequestLogger {
    return Logger.request({ id: randomUUID().slice(0, 8), userId, network });
  }

  private monitorContext(): MonitorContext {
    return {
      store: this.options.store,
      registry: this.options.registry,
      polling: this.polling,
      attach: (userId, client) => this.attach(userId, client),
    };
  }

  private disconnectContext() {
    const { store, registry, sessions, clients, catalog } = this.options;
    return { store, registry, sessions, clients, catalog };
  }
}
