import fs from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import { DEFAULT_POLLING } from './constants';
import { Logger } from './logging';
import { errorMessage, isNotFound, sleep } from './utils';

const log = Logger.get('session-store');

const USERNAME = /^[A-Za-z0-9._=-]+$/;

/**
 * Per-user directories holding the homeserver session and sync position.
 * Clearing a directory forces the next client to start from a clean slate.
 */
export class SessionStore {
  constructor(
    private readonly basePath: string,
    private readonly settleDelayMs: number = DEFAULT_POLLING.settleDelayMs
  ) {}

  public pathFor(username: string): string {
    if (!USERNAME.test(username) || username === '.' || username === '..') {
      throw new Error(`Invalid username for session store: ${username}`);
    }

    return path.join(this.basePath, username);
  }

  public async ensure(username: string): Promise<string> {
    const dir = this.pathFor(username);

    await fs.mkdir(dir, { recursive: true });

    return dir;
  }

  public async clear(username: string): Promise<void> {
    const dir = this.pathFor(username);

    log.info('Clearing session store for %s', username);

    await fs.rm(dir, { recursive: true, force: true });

    // let the filesystem settle before recreating
    await sleep(this.settleDelayMs);

    await fs.mkdir(dir, { recursive: true });
  }

  public async readJson<T>(username: string, file: string, schema: z.ZodType<T>) {
    const target = path.join(this.pathFor(username), file);

    let contents: string;

    try {
      contents = await fs.readFile(target, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }

    try {
      const result = schema.safeParse(JSON.parse(contents));

      if (result.success) return result.data;

      log.warn('Ignoring malformed %s for %s: %s', file, username, result.error.message);
    } catch (err) {
      log.warn('Ignoring unreadable %s for %s: %s', file, username, errorMessage(err));
    }

    return undefined;
  }

  public async writeJson(username: string, file: string, value: unknown): Promise<void> {
    const dir = await this.ensure(username);

    await fs.writeFile(path.join(dir, file), JSON.stringify(value, null, 2), 'utf8');
  }
}
