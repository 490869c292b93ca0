import type { ClientFactory, ProtocolClient } from '../client/protocol-client';
import type { BridgeStore } from '../data-store';
import type { RequestLogger } from '../logging';
import type { BridgeRecord, BridgeType } from '../models/bridge-record';
import type { NetworkCatalog, NetworkProfile } from '../models/network';
import type { ConnectionRegistry } from '../registry';
import type { SessionStore } from '../session-store';
import { errorMessage, sleep } from '../utils';

export interface DisconnectContext {
  store: BridgeStore;
  registry: ConnectionRegistry;
  sessions: SessionStore;
  clients: ClientFactory;
  catalog: NetworkCatalog;
}

export interface DisconnectResult {
  wasConnected: boolean;
  /** whether the user's last bridge went and the session was torn down */
  releasedSession: boolean;
}

const teardown = async (
  client: ProtocolClient,
  record: BridgeRecord,
  profile: NetworkProfile,
  log: RequestLogger
) => {
  for (const step of profile.teardown) {
    try {
      await client.sendText(record.roomId, step.command);
    } catch (err) {
      log.warn('Teardown command "%s" failed: %s', step.command, errorMessage(err));
    }

    await sleep(step.pauseMs);
  }

  if (!profile.leaveRoomOnDisconnect) return;

  try {
    await client.leaveRoom(record.roomId);
  } catch (err) {
    log.warn('Could not leave management room %s: %s', record.roomId, errorMessage(err));
  }
};

const releaseSession = async (
  ctx: DisconnectContext,
  userId: number,
  client: ProtocolClient | undefined,
  log: RequestLogger
) => {
  // stop the sync task first so no round rewrites the store after it is cleared
  ctx.registry.detach(userId);

  const username = client?.username ?? (await ctx.clients.usernameFor(userId));

  if (username) {
    try {
      await ctx.sessions.clear(username);
    } catch (err) {
      log.error('Could not clear session store for %s: %s', username, errorMessage(err));
    }
  }
};

/**
 * Logs the user out of one network and removes its record. Safe to repeat:
 * without a record nothing is sent and nothing changes.
 */
export const disconnect = async (
  ctx: DisconnectContext,
  userId: number,
  bridgeType: BridgeType,
  log: RequestLogger
): Promise<DisconnectResult> => {
  const record = await ctx.store.get(userId, bridgeType);

  if (!record) {
    log.info('Nothing to disconnect');
    return { wasConnected: false, releasedSession: false };
  }

  ctx.registry.abortMonitor(userId, bridgeType);

  let client: ProtocolClient | undefined;

  try {
    client = await ctx.clients.getCachedClient(userId);
  } catch (err) {
    log.warn('No client available, skipping bridge logout: %s', errorMessage(err));
  }

  const profile = ctx.catalog.find(bridgeType);

  if (client && profile) await teardown(client, record, profile, log);

  await ctx.store.delete(userId, bridgeType);

  log.info('Removed %s record', record.status);

  if (await ctx.store.hasActive(userId)) {
    return { wasConnected: true, releasedSession: false };
  }

  await releaseSession(ctx, userId, client, log);

  return { wasConnected: true, releasedSession: true };
};
