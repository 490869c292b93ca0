import { createServerAdapter } from '@whatwg-node/server';
import { createServer, type Server } from 'http';
import { AutoRouter, cors, error, type IRequest, json } from 'itty-router';
import { z } from 'zod';
import type { BridgeManager } from './bridge';
import { DEFAULT_API_PORT } from './constants';
import { Logger } from './logging';
import { BRIDGE_TYPES } from './models/bridge-record';
import { InvalidRequestError, toBridgeError } from './models/errors';
import { errorMessage } from './utils';

const log = Logger.get('api');

const BridgeParamsSchema = z.object({
  userId: z.coerce.number().int().positive(),
  network: z.enum(BRIDGE_TYPES),
});

const StartBodySchema = z
  .object({
    phoneNumber: z
      .string()
      .trim()
      .regex(/^\+?[0-9 ()-]{5,20}$/, 'phoneNumber must be a phone number')
      .optional(),
  })
  .strict();

const parseParams = (request: IRequest) => {
  const result = BridgeParamsSchema.safeParse(request.params);
  if (!result.success) throw new InvalidRequestError(result.error.issues[0]?.message ?? 'Invalid path');
  return result.data;
};

const parseStartBody = async (request: IRequest) => {
  const text = await request.text();

  if (text.trim().length === 0) return {};

  let body: unknown;

  try {
    body = JSON.parse(text);
  } catch {
    throw new InvalidRequestError('Request body must be JSON');
  }

  const result = StartBodySchema.safeParse(body);
  if (!result.success) throw new InvalidRequestError(result.error.issues[0]?.message ?? 'Invalid body');
  return result.data;
};

const renderError = (err: unknown) => {
  const bridgeError = toBridgeError(err);

  bridgeError.status >= 500
    ? log.error('%s: %s', bridgeError.code, errorMessage(bridgeError.cause ?? bridgeError))
    : log.debug('%s: %s', bridgeError.code, bridgeError.message);

  return error(bridgeError.status, { error: bridgeError.code, message: bridgeError.message });
};

export class API {
  public readonly router;

  constructor(
    private readonly manager: BridgeManager,
    private readonly env: {
      hostname?: string;
      port?: number;
      token?: string;
    }
  ) {
    const { preflight, corsify } = cors();

    this.router = AutoRouter({
      before: [preflight, (request: IRequest) => this.authorize(request)],
      finally: [corsify],
      catch: renderError,
    });

    this.router.get('/health', () => json({ status: 'ok' }));

    this.router.post('/users/:userId/bridges/:network', async (request: IRequest) => {
      const { userId, network } = parseParams(request);
      const { phoneNumber } = await parseStartBody(request);

      log.info('start %s for user %s', network, userId);

      return json(await this.manager.startConnection(userId, network, phoneNumber));
    });

    this.router.get('/users/:userId/bridges/:network', async (request: IRequest) => {
      const { userId, network } = parseParams(request);
      const { connected, status, createdAt } = await this.manager.getStatus(userId, network);

      return json({ connected, status, created_at: createdAt });
    });

    this.router.delete('/users/:userId/bridges/:network', async (request: IRequest) => {
      const { userId, network } = parseParams(request);

      log.info('disconnect %s for user %s', network, userId);

      const { wasConnected } = await this.manager.disconnect(userId, network);

      return json({ disconnected: wasConnected });
    });

    this.router.post('/users/:userId/bridges/:network/resync', async (request: IRequest) => {
      const { userId, network } = parseParams(request);

      log.info('resync %s for user %s', network, userId);

      await this.manager.resync(userId, network);

      return json({ status: 'resync_started' });
    });
  }

  private authorize(request: IRequest) {
    if (request.method === 'OPTIONS') return;
    if (new URL(request.url).pathname === '/health') return;

    if (!this.env.token) return error(503, { error: 'configuration_error', message: 'API token not configured' });

    if (request.headers.get('authorization') !== `Bearer ${this.env.token}`) {
      return error(401, { error: 'unauthorized', message: 'Missing or invalid bearer token' });
    }
  }

  public listen(): Server {
    const server = createServer(createServerAdapter(this.router.fetch));

    const hostname = this.env.hostname ?? '0.0.0.0';
    const port = this.env.port ?? DEFAULT_API_PORT;

    server.listen(port, hostname);

    log.info('API successfully initialised, listening now on %s:%s', hostname, port);

    return server;
  }
}
