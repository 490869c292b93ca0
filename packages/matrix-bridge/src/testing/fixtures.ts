import type { ClientFactory } from '../client/protocol-client';
import { DEFAULT_POLLING, type PollingConfig } from '../constants';
import type { RequestLogger } from '../logging';
import {
  DEFAULT_NETWORKS_PATH,
  NetworkCatalog,
  NetworksFileSchema,
} from '../models/network';
import type { ConnectionRegistry } from '../registry';
import { readYaml } from '../utils';
import { FakeProtocolClient } from './fake-client';

export const WHATSAPP_BOT = '@whatsappbot:localhost';
export const SIGNAL_BOT = '@signalbot:localhost';
export const TELEGRAM_BOT = '@telegrambot:localhost';

export const BOTS = {
  whatsapp: WHATSAPP_BOT,
  signal: SIGNAL_BOT,
  telegram: TELEGRAM_BOT,
};

export const FAST_POLLING: PollingConfig = {
  ...DEFAULT_POLLING,
  inviteSyncTimeoutMs: 0,
  joinAttempts: 3,
  joinIntervalMs: 0,
  artifactAttempts: 3,
  artifactSyncTimeoutMs: 0,
  artifactIntervalMs: 0,
  retryDelayMs: 0,
  settleDelayMs: 0,
  monitorAttempts: 3,
  monitorSyncTimeoutMs: 0,
  monitorIntervalMs: 0,
  postLoginDelayMs: 0,
  persistentSyncTimeoutMs: 0,
  syncYieldMs: 5,
  syncBackoffMs: 5,
  resyncStartupDelayMs: 0,
};

export const silentLog: RequestLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** The shipped profiles with every pause set to zero. */
export const loadTestCatalog = async () => {
  const file = NetworksFileSchema.parse(await readYaml(DEFAULT_NETWORKS_PATH));

  for (const profile of Object.values(file.networks)) {
    if (!profile) continue;

    profile.resyncDelayMs = 0;
    profile.teardown.forEach((step) => {
      step.pauseMs = 0;
    });
  }

  return new NetworkCatalog(file);
};

/** Hands out scripted clients; `prepare` runs on each before it is returned. */
export class FakeClientFactory implements ClientFactory {
  public readonly built: FakeProtocolClient[] = [];

  constructor(
    private readonly registry: ConnectionRegistry,
    public prepare: (client: FakeProtocolClient, index: number) => void = () => undefined
  ) {}

  public async getClient(_userId: number) {
    const client = new FakeProtocolClient();

    this.prepare(client, this.built.length);
    this.built.push(client);

    return client;
  }

  public async getCachedClient(userId: number) {
    return this.registry.getClient(userId) ?? this.getClient(userId);
  }

  public async usernameFor(_userId: number) {
    return 'appuser_test';
  }
}
