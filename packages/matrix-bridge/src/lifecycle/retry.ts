import type { ClientFactory, ProtocolClient } from '../client/protocol-client';
import type { RequestLogger } from '../logging';
import { KeyConflictExhaustedError } from '../models/errors';
import type { ClientSlot } from '../registry';
import type { SessionStore } from '../session-store';
import { errorMessage, sleep } from '../utils';

export interface RetryOptions {
  userId: number;
  maxRetries: number;
  retryDelayMs: number;
  sessions: SessionStore;
  clients: ClientFactory;
  log: RequestLogger;
}

/** The homeserver refused a one-time key the local session believes is new. */
export const isOneTimeKeyConflict = (err: unknown) => {
  const message = errorMessage(err);
  return message.includes('One time key') && message.includes('already exists');
};

/**
 * Runs `attempt` with the slot's client. A one-time-key conflict clears the
 * session store, swaps a fresh client into the slot and tries again, at most
 * `maxRetries` invocations in total. Other errors pass straight through.
 */
export const negotiateWithRetry = async <T>(
  slot: ClientSlot,
  attempt: (client: ProtocolClient) => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const { userId, maxRetries, retryDelayMs, sessions, clients, log } = options;

  let lastError: unknown;

  for (let invocation = 1; invocation <= maxRetries; invocation++) {
    try {
      return await attempt(slot.current);
    } catch (err) {
      if (!isOneTimeKeyConflict(err)) throw err;

      lastError = err;

      if (invocation === maxRetries) break;

      log.warn(
        'One-time key conflict (attempt %s of %s), rebuilding session: %s',
        invocation,
        maxRetries,
        errorMessage(err)
      );

      await sessions.clear(slot.current.username);

      await sleep(retryDelayMs);

      slot.replace(await clients.getClient(userId));
    }
  }

  throw new KeyConflictExhaustedError(maxRetries, lastError);
};
