import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NeDBCredentialStore } from '../data-store/nedb';
import { ClientInitError, ConfigurationError } from '../models/errors';
import { ConnectionRegistry } from '../registry';
import { SessionStore } from '../session-store';
import { SyncTask } from '../sync-task';
import { FakeProtocolClient } from '../testing/fake-client';
import { type Connector, MatrixClientFactory } from './factory';
import type { MatrixSession } from './matrix-client';

const stored = {
  userId: 7,
  matrixUserId: '@appuser_abc:localhost',
  username: 'appuser_abc',
  accessToken: 'test-token-stored',
  deviceId: 'DEVICE1',
};

describe('MatrixClientFactory', () => {
  let base: string;
  let sessions: SessionStore;
  let credentials: NeDBCredentialStore;
  let registry: ConnectionRegistry;
  let accepted: Set<string>;
  let connect: Connector;
  let attempts: MatrixSession[];

  const factory = (options: { sharedSecret?: string; register?: () => Promise<typeof stored> } = {}) =>
    new MatrixClientFactory({
      homeserverUrl: 'http://localhost:8008',
      credentials,
      sessions,
      registry,
      connect,
      ...options,
    });

  beforeEach(async () => {
    base = await fs.mkdtemp(path.join(os.tmpdir(), 'factory-'));
    sessions = new SessionStore(base, 0);
    credentials = await NeDBCredentialStore.open();
    registry = new ConnectionRegistry();
    accepted = new Set(['test-token-stored']);
    attempts = [];

    connect = async (session, username) => {
      attempts.push(session);
      if (!accepted.has(session.accessToken)) throw new Error('M_UNKNOWN_TOKEN');
      return new FakeProtocolClient(session.userId, username);
    };
  });

  afterEach(async () => {
    registry.stopAll();
    await fs.rm(base, { recursive: true, force: true });
  });

  it('opens a session from stored credentials and saves it', async () => {
    await credentials.save(stored);

    const client = await factory().getClient(7);

    expect(client.username).toBe('appuser_abc');
    expect(attempts.map(({ accessToken }) => accessToken)).toEqual(['test-token-stored']);
    expect(JSON.parse(await fs.readFile(path.join(base, 'appuser_abc', 'session.json'), 'utf8'))).toEqual({
      userId: '@appuser_abc:localhost',
      deviceId: 'DEVICE1',
      accessToken: 'test-token-stored',
    });
  });

  it('prefers a saved session and records its token', async () => {
    await credentials.save(stored);
    await sessions.writeJson('appuser_abc', 'session.json', {
      userId: '@appuser_abc:localhost',
      deviceId: 'DEVICE2',
      accessToken: 'test-token-saved',
    });
    accepted.add('test-token-saved');

    await factory().getClient(7);

    expect(attempts.map(({ accessToken }) => accessToken)).toEqual(['test-token-saved']);
    expect(await credentials.get(7)).toMatchObject({ accessToken: 'test-token-saved', deviceId: 'DEVICE2' });
  });

  it('falls back to the stored credentials when the saved session is rejected', async () => {
    await credentials.save(stored);
    await sessions.writeJson('appuser_abc', 'session.json', {
      userId: '@appuser_abc:localhost',
      deviceId: 'DEVICE2',
      accessToken: 'test-token-expired',
    });

    await factory().getClient(7);

    expect(attempts.map(({ accessToken }) => accessToken)).toEqual(['test-token-expired', 'test-token-stored']);
    expect(await credentials.get(7)).toMatchObject({ accessToken: 'test-token-stored' });
  });

  it('fails when no session verifies', async () => {
    await credentials.save({ ...stored, accessToken: 'test-token-revoked' });

    await expect(factory().getClient(7)).rejects.toBeInstanceOf(ClientInitError);
  });

  it('registers an account for a new user', async () => {
    const register = vi.fn(async () => ({
      ...stored,
      matrixUserId: '@appuser_new:localhost',
      username: 'appuser_new',
    }));

    const client = await factory({ register }).getClient(7);

    expect(register).toHaveBeenCalledTimes(1);
    expect(client.username).toBe('appuser_new');
    expect(await credentials.get(7)).toMatchObject({ userId: 7, username: 'appuser_new' });
  });

  it('needs a shared secret to register', async () => {
    await expect(factory().getClient(7)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('returns the registry client when there is one', async () => {
    await credentials.save(stored);
    const live = new FakeProtocolClient();
    registry.attach(7, live, () => undefined, () =>
      new SyncTask(live, 7, { timeoutMs: 0, yieldMs: 60_000, backoffMs: 60_000 })
    );

    expect(await factory().getCachedClient(7)).toBe(live);
    expect(await factory().getCachedClient(8).catch((err: unknown) => err)).toBeInstanceOf(ConfigurationError);
    expect(await factory().usernameFor(7)).toBe('appuser_abc');
  });
});
