import { beforeEach, describe, expect, it } from 'vitest';
import type { NetworkCatalog } from '../models/network';
import {
  ArtifactTimeoutError,
  BotJoinFailedError,
  BridgeBotError,
  MissingParameterError,
} from '../models/errors';
import { FakeProtocolClient } from '../testing/fake-client';
import {
  FAST_POLLING,
  loadTestCatalog,
  SIGNAL_BOT,
  silentLog,
  TELEGRAM_BOT,
  WHATSAPP_BOT,
} from '../testing/fixtures';
import { negotiate } from './negotiator';

describe('negotiate', () => {
  let catalog: NetworkCatalog;
  let client: FakeProtocolClient;

  beforeEach(async () => {
    catalog = await loadTestCatalog();
    client = new FakeProtocolClient();
  });

  const whatsapp = (param?: string) =>
    negotiate(client, {
      botUserId: WHATSAPP_BOT,
      profile: catalog.get('whatsapp'),
      param,
      polling: FAST_POLLING,
      log: silentLog,
    });

  it('returns the pairing code the bot posts', async () => {
    client.onSend = (roomId, body) => {
      if (body.startsWith('!wa login')) client.post(roomId, WHATSAPP_BOT, 'Your code: **AB12-CD34**');
    };

    const result = await whatsapp('+15550100');

    expect(result).toEqual({
      roomId: '!room1:localhost',
      artifact: { kind: 'pairing-code', code: 'AB12-CD34' },
    });
    expect(client.sentTo('!room1:localhost')).toEqual(['!wa cancel', '!wa login phone +15550100']);
    expect(client.rooms.get('!room1:localhost')?.invited.has(WHATSAPP_BOT)).toBe(true);
  });

  it('reads past the pairing instructions to the code', async () => {
    client.onSend = (roomId, body) => {
      if (!body.startsWith('!wa login')) return;
      client.post(roomId, WHATSAPP_BOT, 'WX9Z-QR7T');
      client.post(roomId, WHATSAPP_BOT, 'Input the pairing code on your phone, e.g. ABCD-1234');
    };

    await expect(whatsapp('+15550100')).resolves.toMatchObject({
      artifact: { kind: 'pairing-code', code: 'WX9Z-QR7T' },
    });
  });

  it('waits for the bot to join', async () => {
    client.joinDelay = 2;
    client.onSend = (roomId, body) => {
      if (body.startsWith('!wa login')) client.post(roomId, WHATSAPP_BOT, 'AB12-CD34');
    };

    await expect(whatsapp('+15550100')).resolves.toMatchObject({ artifact: { code: 'AB12-CD34' } });
  });

  it('fails when the bot never joins', async () => {
    client.joinDelay = Infinity;

    await expect(whatsapp('+15550100')).rejects.toBeInstanceOf(BotJoinFailedError);
    expect(client.sent).toEqual([]);
  });

  it('surfaces a bot error', async () => {
    client.onSend = (roomId, body) => {
      if (body.startsWith('!wa login')) client.post(roomId, WHATSAPP_BOT, 'error: phone number invalid');
    };

    const failure = whatsapp('+15550100');

    await expect(failure).rejects.toBeInstanceOf(BridgeBotError);
    await expect(failure).rejects.toMatchObject({ body: 'error: phone number invalid' });
  });

  it('ignores messages from other senders', async () => {
    client.onSend = (roomId, body) => {
      if (body.startsWith('!wa login')) client.post(roomId, '@someone:localhost', 'AB12-CD34');
    };

    await expect(whatsapp('+15550100')).rejects.toBeInstanceOf(ArtifactTimeoutError);
    expect(client.syncCalls).toHaveLength(1 + FAST_POLLING.artifactAttempts);
  });

  it('requires the phone number before creating a room', async () => {
    await expect(whatsapp()).rejects.toBeInstanceOf(MissingParameterError);
    expect(client.rooms.size).toBe(0);
  });

  it('returns the QR image reference for signal without a cancel command', async () => {
    client.onSend = (roomId) => {
      client.post(roomId, SIGNAL_BOT, 'qr.png', 'image', { url: 'mxc://localhost/qr', mimetype: 'image/png' });
    };

    const result = await negotiate(client, {
      botUserId: SIGNAL_BOT,
      profile: catalog.get('signal'),
      polling: FAST_POLLING,
      log: silentLog,
    });

    expect(result.artifact).toEqual({ kind: 'qr', mxcUrl: 'mxc://localhost/qr', mimetype: 'image/png' });
    expect(client.sent.map(({ body }) => body)).toEqual(['!signal login']);
  });

  it('extracts the telegram login url', async () => {
    client.onSend = (roomId, body) => {
      if (body === '!tg login') {
        client.post(roomId, TELEGRAM_BOT, 'Log in at [telegram](https://example.org/tg/login)');
      }
    };

    const result = await negotiate(client, {
      botUserId: TELEGRAM_BOT,
      profile: catalog.get('telegram'),
      polling: FAST_POLLING,
      log: silentLog,
    });

    expect(result.artifact).toEqual({ kind: 'login-url', url: 'https://example.org/tg/login' });
  });
});
