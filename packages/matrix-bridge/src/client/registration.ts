import { createHmac, randomBytes, randomUUID } from 'node:crypto';
import { fetch, type Response } from 'undici';
import { z } from 'zod';
import { REGISTER_ENDPOINT, USERNAME_PREFIX } from '../constants';
import { Logger } from '../logging';

const log = Logger.get('registration');

const NonceSchema = z.object({ nonce: z.string() });

const RegisterResponseSchema = z.object({
  user_id: z.string(),
  access_token: z.string(),
  device_id: z.string(),
});

export interface RegisteredAccount {
  matrixUserId: string;
  username: string;
  accessToken: string;
  deviceId: string;
}

export const generateUsername = () => `${USERNAME_PREFIX}${randomUUID().replaceAll('-', '')}`;

/** HMAC-SHA1 the homeserver expects over the NUL-separated registration fields. */
export const registrationMac = (
  sharedSecret: string,
  nonce: string,
  username: string,
  password: string,
  admin = false
) =>
  createHmac('sha1', sharedSecret)
    .update([nonce, username, password, admin ? 'admin' : 'notadmin'].join('\0'))
    .digest('hex');

const readJson = async (response: Response, step: string) => {
  if (!response.ok) {
    throw new Error(`Registration ${step} failed with status ${response.status}: ${await response.text()}`);
  }

  return response.json();
};

/**
 * Creates a non-admin homeserver account through the shared-secret admin API.
 */
export const register = async (
  homeserverUrl: string,
  sharedSecret: string
): Promise<RegisteredAccount> => {
  const endpoint = new URL(REGISTER_ENDPOINT, homeserverUrl);

  const { nonce } = NonceSchema.parse(await readJson(await fetch(endpoint), 'nonce request'));

  const username = generateUsername();
  const password = randomBytes(24).toString('base64url');

  const response = await fetch(endpoint, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      nonce,
      username,
      password,
      admin: false,
      mac: registrationMac(sharedSecret, nonce, username, password),
    }),
  });

  const account = RegisterResponseSchema.parse(await readJson(response, 'request'));

  log.info('Registered homeserver account %s', account.user_id);

  return {
    matrixUserId: account.user_id,
    username,
    accessToken: account.access_token,
    deviceId: account.device_id,
  };
};
