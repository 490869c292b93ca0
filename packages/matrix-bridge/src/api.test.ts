import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { API } from './api';
import { BridgeManager } from './bridge';
import { NeDBBridgeStore } from './data-store/nedb';
import { ConnectionRegistry } from './registry';
import { SessionStore } from './session-store';
import { BOTS, FAST_POLLING, FakeClientFactory, loadTestCatalog, WHATSAPP_BOT } from './testing/fixtures';

const TOKEN = 'test-token';

describe('API', () => {
  let base: string;
  let manager: BridgeManager;
  let api: API;
  let store: NeDBBridgeStore;
  let clients: FakeClientFactory;

  const call = (pathname: string, init: RequestInit = {}, token: string | undefined = TOKEN) =>
    api.router.fetch(
      new Request(`http://localhost${pathname}`, {
        ...init,
        headers: token ? { Authorization: `Bearer ${token}` } : {},
      })
    );

  beforeEach(async () => {
    base = await fs.mkdtemp(path.join(os.tmpdir(), 'api-'));
    store = await NeDBBridgeStore.open();
    const registry = new ConnectionRegistry();
    clients = new FakeClientFactory(registry);

    manager = new BridgeManager({
      store,
      registry,
      sessions: new SessionStore(base, 0),
      clients,
      catalog: await loadTestCatalog(),
      bots: BOTS,
      polling: { ...FAST_POLLING, monitorIntervalMs: 60_000 },
    });

    api = new API(manager, { token: TOKEN });
  });

  afterEach(async () => {
    manager.shutdown();
    await fs.rm(base, { recursive: true, force: true });
  });

  it('answers health checks without a token', async () => {
    const response = await call('/health', {}, undefined);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('rejects requests without the bearer token', async () => {
    const missing = await call('/users/7/bridges/whatsapp', {}, undefined);
    const wrong = await call('/users/7/bridges/whatsapp', {}, 'not-the-token');

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(401);
    expect(await missing.json()).toMatchObject({ error: 'unauthorized' });
  });

  it('reports status', async () => {
    const response = await call('/users/7/bridges/whatsapp');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ connected: false, status: 'not_connected', created_at: 0 });

    await store.create({ userId: 7, bridgeType: 'signal', status: 'connected', roomId: '!s:localhost', createdAt: 1234 });

    expect(await (await call('/users/7/bridges/signal')).json()).toEqual({
      connected: true,
      status: 'connected',
      created_at: 1234,
    });
  });

  it('starts a connection and returns the artifact', async () => {
    clients.prepare = (client) => {
      client.onSend = (roomId, body) => {
        if (body.startsWith('!wa login')) client.post(roomId, WHATSAPP_BOT, 'Code: AB12-CD34');
      };
    };

    const response = await call('/users/7/bridges/whatsapp', {
      method: 'POST',
      body: JSON.stringify({ phoneNumber: '+15550100' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ kind: 'pairing-code', code: 'AB12-CD34' });
    expect(clients.built[0]?.sent.map(({ body }) => body)).toContain('!wa login phone +15550100');
  });

  it('maps domain errors to their status and code', async () => {
    const missing = await call('/users/7/bridges/whatsapp', { method: 'POST' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({
      error: 'missing_parameter',
      message: 'Missing required parameter: phoneNumber',
    });

    const unsupported = await call('/users/7/bridges/messenger', { method: 'POST' });
    expect(unsupported.status).toBe(400);
    expect(await unsupported.json()).toMatchObject({ error: 'unsupported_network' });

    const resync = await call('/users/7/bridges/whatsapp/resync', { method: 'POST' });
    expect(resync.status).toBe(409);
    expect(await resync.json()).toMatchObject({ error: 'not_connected', message: 'WhatsApp is not connected' });
  });

  it('validates path and body', async () => {
    const network = await call('/users/7/bridges/icq');
    expect(network.status).toBe(400);
    expect(await network.json()).toMatchObject({ error: 'invalid_request' });

    const user = await call('/users/abc/bridges/whatsapp');
    expect(user.status).toBe(400);

    const body = await call('/users/7/bridges/whatsapp', { method: 'POST', body: '{oops' });
    expect(body.status).toBe(400);
    expect(await body.json()).toMatchObject({ error: 'invalid_request', message: 'Request body must be JSON' });

    const phone = await call('/users/7/bridges/whatsapp', {
      method: 'POST',
      body: JSON.stringify({ phoneNumber: 'call me' }),
    });
    expect(phone.status).toBe(400);
    expect(await phone.json()).toMatchObject({ message: 'phoneNumber must be a phone number' });
  });

  it('disconnects idempotently', async () => {
    const response = await call('/users/7/bridges/whatsapp', { method: 'DELETE' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ disconnected: false });
  });

  it('answers 404 for unknown routes', async () => {
    expect((await call('/nowhere')).status).toBe(404);
  });
});
