/**
 * Timing and bound knobs for the connection lifecycle. Every wait or retry
 * loop reads from here so tests can run with zero delays.
 */
export interface PollingConfig {
  /** bounded sync right after inviting the bot */
  inviteSyncTimeoutMs: number;
  joinAttempts: number;
  joinIntervalMs: number;

  artifactAttempts: number;
  artifactSyncTimeoutMs: number;
  artifactIntervalMs: number;
  /** how many of the newest room messages each poll inspects */
  messageLimit: number;

  maxRetries: number;
  retryDelayMs: number;
  /** pause between removing and recreating a session directory */
  settleDelayMs: number;

  monitorAttempts: number;
  monitorSyncTimeoutMs: number;
  monitorIntervalMs: number;
  postLoginDelayMs: number;

  persistentSyncTimeoutMs: number;
  syncYieldMs: number;
  syncBackoffMs: number;
  /** wait after attaching a sync task before a resync sends commands */
  resyncStartupDelayMs: number;

  reaperIntervalMs: number;
  connectingTtlSeconds: number;
  /** management-room messages older than this are not acted upon */
  maxMessageAgeMs: number;
}

export const DEFAULT_POLLING: PollingConfig = {
  inviteSyncTimeoutMs: 5_000,
  joinAttempts: 15,
  joinIntervalMs: 500,

  artifactAttempts: 60,
  artifactSyncTimeoutMs: 1_500,
  artifactIntervalMs: 500,
  messageLimit: 5,

  maxRetries: 3,
  retryDelayMs: 2_000,
  settleDelayMs: 500,

  monitorAttempts: 60,
  monitorSyncTimeoutMs: 10_000,
  monitorIntervalMs: 3_000,
  postLoginDelayMs: 500,

  persistentSyncTimeoutMs: 30_000,
  syncYieldMs: 1_000,
  syncBackoffMs: 30_000,
  resyncStartupDelayMs: 2_000,

  reaperIntervalMs: 60_000,
  connectingTtlSeconds: 600,
  maxMessageAgeMs: 30 * 60 * 1_000,
};

export const SESSION_FILE = 'session.json';
export const SYNC_FILE = 'sync.json';

export const REGISTER_ENDPOINT = '/_synapse/admin/v1/register';
export const USERNAME_PREFIX = 'appuser_';

export const DEFAULT_API_PORT = 3302;
