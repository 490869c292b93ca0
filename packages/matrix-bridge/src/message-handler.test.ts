import { beforeEach, describe, expect, it } from 'vitest';
import { NeDBBridgeStore } from './data-store/nedb';
import type { RoomMessage } from './matrix';
import { BridgeEventRouter, type BridgeMessageHandler } from './message-handler';
import { ConnectionRegistry } from './registry';
import { SyncTask } from './sync-task';
import { FakeProtocolClient } from './testing/fake-client';
import { BOTS, loadTestCatalog, SIGNAL_BOT, WHATSAPP_BOT } from './testing/fixtures';

const USER = 7;
const NOW = 1_700_000_000_000;

class RecordingHandler implements BridgeMessageHandler {
  public readonly handled: RoomMessage[] = [];

  public async handle(_userId: number, message: RoomMessage) {
    this.handled.push(message);
  }
}

const message = (overrides: Partial<RoomMessage>): RoomMessage => ({
  eventId: '$1',
  roomId: '!chat:localhost',
  sender: '@friend:localhost',
  timestamp: NOW - 1_000,
  kind: 'text',
  msgtype: 'm.text',
  body: 'hi there',
  ...overrides,
});

describe('BridgeEventRouter', () => {
  let store: NeDBBridgeStore;
  let registry: ConnectionRegistry;
  let downstream: RecordingHandler;
  let router: BridgeEventRouter;
  let client: FakeProtocolClient;

  beforeEach(async () => {
    store = await NeDBBridgeStore.open();
    registry = new ConnectionRegistry();
    downstream = new RecordingHandler();
    client = new FakeProtocolClient();

    router = new BridgeEventRouter({
      store,
      catalog: await loadTestCatalog(),
      registry,
      bots: BOTS,
      downstream,
      maxAgeMs: 30 * 60 * 1_000,
      now: () => NOW,
    });

    await store.create({ userId: USER, bridgeType: 'whatsapp', status: 'connected', roomId: '!wa:localhost', createdAt: 1 });
    registry.attach(USER, client, () => undefined, () =>
      new SyncTask(client, USER, { timeoutMs: 0, yieldMs: 60_000, backoffMs: 60_000 })
    );
  });

  it('forwards ordinary messages', async () => {
    await expect(router.route(USER, message({}))).resolves.toBe('forwarded');
    expect(downstream.handled.map(({ body }) => body)).toEqual(['hi there']);
    registry.stopAll();
  });

  it('drops messages older than the limit', async () => {
    const old = message({ timestamp: NOW - 31 * 60 * 1_000 });

    await expect(router.route(USER, old)).resolves.toBe('stale');
    expect(downstream.handled).toEqual([]);
    registry.stopAll();
  });

  it('drops the last bridge and its client when the bot reports a lost link', async () => {
    const lost = message({ roomId: '!wa:localhost', sender: WHATSAPP_BOT, kind: 'notice', body: 'You were logged out from WhatsApp' });

    await expect(router.route(USER, lost)).resolves.toBe('disconnected');
    expect(await store.get(USER, 'whatsapp')).toBeNull();
    expect(registry.getClient(USER)).toBeUndefined();
  });

  it('keeps the client while another bridge is connected', async () => {
    await store.create({ userId: USER, bridgeType: 'signal', status: 'connected', roomId: '!signal:localhost', createdAt: 1 });
    const lost = message({ roomId: '!wa:localhost', sender: WHATSAPP_BOT, body: 'Connection lost' });

    await expect(router.route(USER, lost)).resolves.toBe('disconnected');
    expect(registry.getClient(USER)).toBe(client);
    registry.stopAll();
  });

  it('ignores other management-room traffic', async () => {
    const fromOtherBot = message({ roomId: '!wa:localhost', sender: SIGNAL_BOT, body: 'logged out' });
    const harmless = message({ roomId: '!wa:localhost', sender: WHATSAPP_BOT, body: 'Synced 12 contacts' });

    await expect(router.route(USER, fromOtherBot)).resolves.toBe('management');
    await expect(router.route(USER, harmless)).resolves.toBe('management');
    expect((await store.get(USER, 'whatsapp'))?.status).toBe('connected');
    expect(downstream.handled).toEqual([]);
    registry.stopAll();
  });

  it('leaves connecting records to their monitor', async () => {
    await store.create({ userId: USER, bridgeType: 'signal', status: 'connecting', roomId: '!signal:localhost', createdAt: 1 });
    const failure = message({ roomId: '!signal:localhost', sender: SIGNAL_BOT, body: 'Login failed' });

    await expect(router.route(USER, failure)).resolves.toBe('management');
    expect(await store.get(USER, 'signal')).not.toBeNull();
    registry.stopAll();
  });
});
