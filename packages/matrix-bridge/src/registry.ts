import { randomUUID } from 'node:crypto';
import type { ProtocolClient, RoomMessageListener } from './client/protocol-client';
import { Logger } from './logging';
import { type BridgeType, recordKey } from './models/bridge-record';
import type { MonitorOutcome } from './lifecycle/monitor';
import type { SyncTask } from './sync-task';

const log = Logger.get('registry');

export interface MonitorHandle {
  userId: number;
  bridgeType: BridgeType;
  nonce: string;
  controller: AbortController;
  done?: Promise<MonitorOutcome>;
}

interface Attachment {
  client: ProtocolClient;
  task: SyncTask;
  detach: () => void;
}

/**
 * Process-wide state: at most one live client and one sync task per user,
 * plus the abort handles of detached monitors.
 */
export class ConnectionRegistry {
  private readonly attachments = new Map<number, Attachment>();

  private readonly monitors = new Map<string, MonitorHandle>();

  public getClient(userId: number): ProtocolClient | undefined {
    return this.attachments.get(userId)?.client;
  }

  public getSyncTask(userId: number): SyncTask | undefined {
    return this.attachments.get(userId)?.task;
  }

  public get size() {
    return this.attachments.size;
  }

  /**
   * Makes `client` the user's live client with its own sync task. A no-op
   * returning false when that client is already attached; a different client
   * replaces the previous one.
   */
  public attach(
    userId: number,
    client: ProtocolClient,
    listener: RoomMessageListener,
    createTask: (client: ProtocolClient) => SyncTask
  ): boolean {
    const current = this.attachments.get(userId);

    if (current?.client === client) return false;

    current && this.detach(userId);

    const unsubscribe = client.onRoomMessage(listener);
    const task = createTask(client).start();

    this.attachments.set(userId, { client, task, detach: unsubscribe });

    log.info('Attached client %s for user %s', client.userId, userId);

    return true;
  }

  /** Stops the sync task and forgets the client. Returns whether one existed. */
  public detach(userId: number): boolean {
    const current = this.attachments.get(userId);

    if (!current) return false;

    this.attachments.delete(userId);

    current.task.stop();
    current.detach();

    log.info('Detached client %s for user %s', current.client.userId, userId);

    return true;
  }

  /** Registers a new monitor for the pair, aborting the one in flight. */
  public registerMonitor(userId: number, bridgeType: BridgeType): MonitorHandle {
    this.abortMonitor(userId, bridgeType);

    const handle: MonitorHandle = {
      userId,
      bridgeType,
      nonce: randomUUID(),
      controller: new AbortController(),
    };

    this.monitors.set(recordKey(userId, bridgeType), handle);

    return handle;
  }

  public releaseMonitor(handle: MonitorHandle) {
    const key = recordKey(handle.userId, handle.bridgeType);

    // a newer monitor may already own the slot
    if (this.monitors.get(key)?.nonce === handle.nonce) this.monitors.delete(key);
  }

  public abortMonitor(userId: number, bridgeType: BridgeType): boolean {
    const key = recordKey(userId, bridgeType);
    const handle = this.monitors.get(key);

    if (!handle) return false;

    this.monitors.delete(key);
    handle.controller.abort();

    log.debug('Aborted monitor %s for user %s (%s)', handle.nonce, userId, bridgeType);

    return true;
  }

  public getMonitor(userId: number, bridgeType: BridgeType): MonitorHandle | undefined {
    return this.monitors.get(recordKey(userId, bridgeType));
  }

  public hasMonitor(userId: number, bridgeType: BridgeType) {
    return this.monitors.has(recordKey(userId, bridgeType));
  }

  public stopAll() {
    for (const handle of this.monitors.values()) handle.controller.abort();
    this.monitors.clear();

    for (const userId of [...this.attachments.keys()]) this.detach(userId);
  }
}

/**
 * Holds the client a negotiation is using. Recovery swaps in a fresh client,
 * and everything after the negotiation reads the slot rather than the client
 * it started with.
 */
export class ClientSlot {
  constructor(private client: ProtocolClient) {}

  public get current() {
    return this.client;
  }

  public replace(next: ProtocolClient) {
    this.client = next;
  }
}
