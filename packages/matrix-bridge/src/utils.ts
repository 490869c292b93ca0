import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';

export const readYaml = (path: string): Promise<unknown> =>
  fs.readFile(path, 'utf8').then((contents) => yaml.load(contents));

export const sleep = (ms: number): Promise<void> => delay(ms);

/** Like `sleep`, but resolves early instead of rejecting when `signal` aborts. */
export const pause = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) return;

  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
};

export const nowSeconds = () => Math.floor(Date.now() / 1000);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const isNotFound = (err: unknown): boolean =>
  isRecord(err) && err.code === 'ENOENT';
