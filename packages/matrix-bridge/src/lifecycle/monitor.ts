import type { ProtocolClient } from '../client/protocol-client';
import type { PollingConfig } from '../constants';
import type { BridgeStore } from '../data-store';
import type { RequestLogger } from '../logging';
import { isTextual } from '../matrix';
import type { BridgeType } from '../models/bridge-record';
import { matchesFailure, matchesSuccess, type NetworkProfile } from '../models/network';
import type { ConnectionRegistry, MonitorHandle } from '../registry';
import { errorMessage, nowSeconds, pause, sleep } from '../utils';

export type MonitorOutcome =
  | { outcome: 'connected' }
  | { outcome: 'failed'; detail: string }
  | { outcome: 'timeout' }
  | { outcome: 'aborted' }
  | { outcome: 'superseded' }
  | { outcome: 'crashed'; detail: string };

export interface MonitorContext {
  store: BridgeStore;
  registry: ConnectionRegistry;
  polling: PollingConfig;
  /** registers the client, its message listener and its sync task */
  attach: (userId: number, client: ProtocolClient) => boolean;
}

export interface MonitorRequest {
  client: ProtocolClient;
  roomId: string;
  botUserId: string;
  userId: number;
  profile: NetworkProfile;
  log: RequestLogger;
  signal?: AbortSignal;
}

/**
 * Deletes the pair's record only while it still belongs to `roomId`, so a
 * stale monitor never removes the record of a newer attempt.
 */
export const discardRecord = async (
  store: BridgeStore,
  userId: number,
  bridgeType: BridgeType,
  roomId: string,
  status?: 'connecting'
) => {
  const record = await store.get(userId, bridgeType);

  if (!record || record.roomId !== roomId) return false;
  if (status && record.status !== status) return false;

  await store.delete(userId, bridgeType);

  return true;
};

/**
 * Turns this attempt's `connecting` record into a `connected` one. Returns
 * false without touching anything when the record was removed or replaced
 * meanwhile.
 */
const promote = async (ctx: MonitorContext, request: MonitorRequest) => {
  const { client, roomId, userId, profile, log, signal } = request;

  const record = await ctx.store.get(userId, profile.network);

  if (signal?.aborted) return false;
  if (record?.roomId !== roomId || record.status !== 'connecting') return false;

  await ctx.store.delete(userId, profile.network);
  await ctx.store.create({
    userId,
    bridgeType: profile.network,
    status: 'connected',
    roomId,
    createdAt: nowSeconds(),
  });

  // a disconnect that started meanwhile removes the record itself
  if (signal?.aborted) return false;

  ctx.attach(userId, client);

  for (const [index, command] of profile.postLoginCommands.entries()) {
    if (index > 0) await sleep(ctx.polling.postLoginDelayMs);

    try {
      await client.sendText(roomId, command);
    } catch (err) {
      log.warn('Post-login command "%s" failed: %s', command, errorMessage(err));
    }
  }

  return true;
};

/**
 * Watches the management room until the bot confirms the login, reports a
 * failure, or the attempts run out. Only a confirmation leaves a record
 * behind.
 */
export const monitor = async (
  ctx: MonitorContext,
  request: MonitorRequest
): Promise<MonitorOutcome> => {
  const { client, roomId, botUserId, userId, profile, log, signal } = request;
  const { polling } = ctx;

  for (let attempt = 1; attempt <= polling.monitorAttempts; attempt++) {
    if (signal?.aborted) return { outcome: 'aborted' };

    if (profile.monitorProbe) await client.sendText(roomId, profile.monitorProbe);

    await client.syncOnce({ timeoutMs: polling.monitorSyncTimeoutMs, signal });

    if (signal?.aborted) return { outcome: 'aborted' };

    const messages = await client.getMessages(roomId, {
      limit: polling.messageLimit,
      direction: 'b',
    });

    if (signal?.aborted) return { outcome: 'aborted' };

    for (const message of messages) {
      if (message.sender !== botUserId || !isTextual(message)) continue;

      if (matchesSuccess(profile, message.body)) {
        log.info('Bridge reported a successful login');

        if (await promote(ctx, request)) return { outcome: 'connected' };

        if (signal?.aborted) return { outcome: 'aborted' };

        log.warn('Record for room %s is gone or was replaced, not promoting', roomId);

        return { outcome: 'superseded' };
      }

      const failure = matchesFailure(profile, message.body);

      if (failure) {
        log.warn('Bridge reported a failure (%s): %s', failure, message.body);

        await discardRecord(ctx.store, userId, profile.network, roomId);

        return { outcome: 'failed', detail: message.body };
      }
    }

    if (attempt < polling.monitorAttempts) await pause(polling.monitorIntervalMs, signal);
  }

  if (signal?.aborted) return { outcome: 'aborted' };

  log.warn('Login not confirmed after %s checks', polling.monitorAttempts);

  await discardRecord(ctx.store, userId, profile.network, roomId);

  return { outcome: 'timeout' };
};

const supervise = async (ctx: MonitorContext, request: MonitorRequest): Promise<MonitorOutcome> => {
  const { userId, profile, roomId, log, signal } = request;

  let result: MonitorOutcome;

  try {
    result = await monitor(ctx, request);
  } catch (err) {
    result = signal?.aborted
      ? { outcome: 'aborted' }
      : { outcome: 'crashed', detail: errorMessage(err) };
  }

  if (result.outcome === 'aborted' || result.outcome === 'crashed') {
    result.outcome === 'crashed'
      ? log.error('Monitor crashed: %s', result.detail)
      : log.info('Monitor aborted');

    try {
      await discardRecord(ctx.store, userId, profile.network, roomId, 'connecting');
    } catch (err) {
      log.error('Could not discard connecting record: %s', errorMessage(err));
    }
  } else {
    log.info('Monitor finished: %s', result.outcome);
  }

  return result;
};

/**
 * Runs the monitor detached from the caller. The returned handle aborts it;
 * starting another monitor for the same pair aborts this one.
 */
export const spawnMonitor = (
  ctx: MonitorContext,
  request: Omit<MonitorRequest, 'signal'>
): MonitorHandle => {
  const handle = ctx.registry.registerMonitor(request.userId, request.profile.network);

  handle.done = supervise(ctx, { ...request, signal: handle.controller.signal }).finally(() =>
    ctx.registry.releaseMonitor(handle)
  );

  return handle;
};
