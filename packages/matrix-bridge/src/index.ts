import * as dotenv from 'dotenv';
import * as path from 'node:path';
import * as url from 'node:url';
import { EnvHttpProxyAgent, setGlobalDispatcher } from 'undici';
import { API } from './api';
import { BridgeManager } from './bridge';
import { MatrixClientFactory } from './client/factory';
import { DEFAULT_POLLING } from './constants';
import { NeDBBridgeStore, NeDBCredentialStore } from './data-store/nedb';
import { describeEnv, readEnv } from './env';
import { Reaper } from './lifecycle/reaper';
import { Logger } from './logging';
import { ConfigurationError } from './models/errors';
import { loadNetworkCatalog } from './models/network';
import { ConnectionRegistry } from './registry';
import { SessionStore } from './session-store';
import { errorMessage } from './utils';

export { API } from './api';
export { BridgeManager, type BridgeManagerOptions } from './bridge';
export type { ClientFactory, ProtocolClient } from './client/protocol-client';
export { MatrixClientFactory } from './client/factory';
export { DEFAULT_POLLING, type PollingConfig } from './constants';
export type { BridgeStore, CredentialStore, MatrixCredentials } from './data-store';
export { NeDBBridgeStore, NeDBCredentialStore } from './data-store/nedb';
export type { BridgeMessageHandler } from './message-handler';
export * from './models/bridge-record';
export * from './models/errors';
export type { PairingArtifact } from './models/pairing';
export { ConnectionRegistry } from './registry';
export { SessionStore } from './session-store';

const log = Logger.get('main');

// Add support for running behind an http proxy.
const envHttpProxyAgent = new EnvHttpProxyAgent();
setGlobalDispatcher(envHttpProxyAgent);

export const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

dotenv.config({ path: path.resolve(__dirname, '../.env') });

const main = async () => {
  const env = readEnv();

  Logger.configure(env.logging);
  Logger.handleUncaught();

  log.debug('Reading environment: %s', describeEnv(env));

  const { homeserver, sharedSecret, storePath } = env.matrix;

  if (!homeserver) throw new ConfigurationError('MATRIX_HOMESERVER is required');
  if (!storePath) throw new ConfigurationError('MATRIX_STORE_PATH is required');

  const dataDir = env.dataDir ?? path.resolve(__dirname, '../data');

  const store = await NeDBBridgeStore.open(path.join(dataDir, 'bridges.db'));
  const credentials = await NeDBCredentialStore.open(path.join(dataDir, 'credentials.db'));
  const catalog = await loadNetworkCatalog(env.networksPath);

  const registry = new ConnectionRegistry();
  const sessions = new SessionStore(storePath);

  const clients = new MatrixClientFactory({
    homeserverUrl: homeserver,
    sharedSecret,
    credentials,
    sessions,
    registry,
  });

  const manager = new BridgeManager({
    store,
    registry,
    sessions,
    clients,
    catalog,
    bots: env.bots,
  });

  for (const network of catalog.networks) {
    env.bots[network] || log.warn('No bridge bot configured for %s', network);
  }

  const reaper = new Reaper(store, registry, {
    ttlSeconds: DEFAULT_POLLING.connectingTtlSeconds,
    intervalMs: DEFAULT_POLLING.reaperIntervalMs,
  });

  await reaper.sweep();
  reaper.start();

  await manager.restoreConnected();

  const server = new API(manager, env.api).listen();

  const shutdown = (signal: string) => {
    log.info('Received %s, shutting down', signal);

    reaper.stop();
    manager.shutdown();

    server.close(() => process.exit(0));
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

// Only run main if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`)
  main().catch((err: unknown) => {
    log.error('Failed to run bridge service: %s', errorMessage(err));

    if (err instanceof Error && err.stack) log.error(err.stack);

    process.exit(1);
  });
