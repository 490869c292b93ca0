import type { BridgeStore } from './data-store';
import { Logger } from './logging';
import { isTextual, type RoomMessage } from './matrix';
import type { BridgeType } from './models/bridge-record';
import type { NetworkCatalog } from './models/network';
import type { ConnectionRegistry } from './registry';

const log = Logger.get('message-handler');

/** Receives the bridged chat traffic of a user's connected networks. */
export interface BridgeMessageHandler {
  handle(userId: number, message: RoomMessage): Promise<void>;
}

export class LoggingMessageHandler implements BridgeMessageHandler {
  public async handle(userId: number, message: RoomMessage) {
    log.debug('Message %s in %s for user %s', message.eventId, message.roomId, userId);
  }
}

export type RouteResult = 'forwarded' | 'stale' | 'management' | 'disconnected';

export interface BridgeEventRouterOptions {
  store: BridgeStore;
  catalog: NetworkCatalog;
  registry: ConnectionRegistry;
  bots: Partial<Record<BridgeType, string>>;
  downstream: BridgeMessageHandler;
  maxAgeMs: number;
  now?: () => number;
}

/**
 * First stop for every message the persistent sync delivers. Watches the
 * management rooms of connected bridges for the bot reporting a lost link;
 * everything else goes downstream.
 */
export class BridgeEventRouter {
  constructor(private readonly options: BridgeEventRouterOptions) {}

  public async route(userId: number, message: RoomMessage): Promise<RouteResult> {
    const { store, catalog, registry, bots, downstream, maxAgeMs } = this.options;
    const now = this.options.now?.() ?? Date.now();

    if (now - message.timestamp > maxAgeMs) return 'stale';

    const records = await store.listForUser(userId);
    const record = records.find((candidate) => candidate.roomId === message.roomId);

    if (!record) {
      await downstream.handle(userId, message);
      return 'forwarded';
    }

    if (
      record.status !== 'connected' ||
      message.sender !== bots[record.bridgeType] ||
      !isTextual(message) ||
      !catalog.isDisconnection(message.body)
    ) {
      return 'management';
    }

    log.warn(
      'Bridge %s reported a lost connection for user %s: %s',
      record.bridgeType,
      userId,
      message.body
    );

    await store.delete(userId, record.bridgeType);

    if (!(await store.hasActive(userId))) registry.detach(userId);

    return 'disconnected';
  }
}
