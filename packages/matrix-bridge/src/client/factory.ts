import { SESSION_FILE } from '../constants';
import type { CredentialStore, MatrixCredentials } from '../data-store';
import { Logger } from '../logging';
import { ClientInitError, ConfigurationError } from '../models/errors';
import type { ConnectionRegistry } from '../registry';
import type { SessionStore } from '../session-store';
import { errorMessage } from '../utils';
import { MatrixProtocolClient, type MatrixSession, MatrixSessionSchema } from './matrix-client';
import type { ClientFactory, ProtocolClient } from './protocol-client';
import { register, type RegisteredAccount } from './registration';

const log = Logger.get('client-factory');

export type Connector = (
  session: MatrixSession,
  username: string
) => Promise<ProtocolClient>;

export type Registrar = () => Promise<RegisteredAccount>;

export interface MatrixClientFactoryOptions {
  homeserverUrl: string;
  sharedSecret?: string;
  credentials: CredentialStore;
  sessions: SessionStore;
  registry: ConnectionRegistry;
  connect?: Connector;
  register?: Registrar;
}

export class MatrixClientFactory implements ClientFactory {
  private readonly connect: Connector;

  private readonly register?: Registrar;

  constructor(private readonly options: MatrixClientFactoryOptions) {
    const { homeserverUrl, sharedSecret, sessions } = options;

    this.connect =
      options.connect ??
      ((session, username) =>
        MatrixProtocolClient.connect(homeserverUrl, session, sessions, username));

    this.register =
      options.register ?? (sharedSecret ? () => register(homeserverUrl, sharedSecret) : undefined);
  }

  public async getCachedClient(userId: number) {
    return this.options.registry.getClient(userId) ?? this.getClient(userId);
  }

  public async usernameFor(userId: number) {
    const credentials = await this.options.credentials.get(userId);
    return credentials?.username;
  }

  /**
   * Builds a new client. Prefers the session saved in the user's store, then
   * the stored credentials; the session that verifies is written back.
   */
  public async getClient(userId: number): Promise<ProtocolClient> {
    const { credentials, sessions } = this.options;

    const stored = (await credentials.get(userId)) ?? (await this.provision(userId));

    await sessions.ensure(stored.username);

    const saved = await sessions.readJson(stored.username, SESSION_FILE, MatrixSessionSchema);

    const candidates: MatrixSession[] = [
      ...(saved && saved.accessToken !== stored.accessToken ? [saved] : []),
      { userId: stored.matrixUserId, deviceId: stored.deviceId, accessToken: stored.accessToken },
    ];

    let lastError: unknown;

    for (const candidate of candidates) {
      try {
        const client = await this.connect(candidate, stored.username);

        await sessions.writeJson(stored.username, SESSION_FILE, candidate);

        if (candidate.accessToken !== stored.accessToken || candidate.deviceId !== stored.deviceId) {
          await credentials.save({
            ...stored,
            accessToken: candidate.accessToken,
            deviceId: candidate.deviceId,
          });
        }

        log.debug('Opened client for user %s (%s)', userId, candidate.userId);

        return client;
      } catch (err) {
        lastError = err;

        log.warn('Session for user %s rejected: %s', userId, errorMessage(err));
      }
    }

    throw new ClientInitError(userId, lastError);
  }

  private async provision(userId: number): Promise<MatrixCredentials> {
    if (!this.register) {
      throw new ConfigurationError(
        `No homeserver account for user ${userId} and no registration shared secret configured`
      );
    }

    const account = await this.register();

    const credentials: MatrixCredentials = { userId, ...account };

    await this.options.credentials.save(credentials);

    log.info('Provisioned homeserver account %s for user %s', account.matrixUserId, userId);

    return credentials;
  }
}
