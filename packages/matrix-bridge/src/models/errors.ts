import { errorMessage } from '../utils';

/**
 * Base class for every failure surfaced to callers. `code` is stable and
 * machine readable, `status` is the HTTP status the API answers with.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class BotJoinFailedError extends BridgeError {
  constructor(botUserId: string, roomId: string) {
    super(`Bridge bot ${botUserId} did not join room ${roomId}`, 'bot_join_failed', 502);
  }
}

/** The bridge bot answered the login command with an error. */
export class BridgeBotError extends BridgeError {
  constructor(public readonly body: string) {
    super(`Bridge bot reported an error: ${body}`, 'bridge_bot_error', 502);
  }
}

export class ArtifactTimeoutError extends BridgeError {
  constructor(attempts: number) {
    super(`No pairing artifact received after ${attempts} attempts`, 'artifact_timeout', 504);
  }
}

export class KeyConflictExhaustedError extends BridgeError {
  constructor(attempts: number, cause?: unknown) {
    super(
      `One-time key conflict persisted after ${attempts} attempts`,
      'key_conflict_exhausted',
      503,
      { cause }
    );
  }
}

export class NotConnectedError extends BridgeError {
  constructor(network: string) {
    super(`${network} is not connected`, 'not_connected', 409);
  }
}

export class UnsupportedNetworkError extends BridgeError {
  constructor(network: string) {
    super(`Network ${network} is not supported`, 'unsupported_network', 400);
  }
}

export class MissingParameterError extends BridgeError {
  constructor(parameter: string) {
    super(`Missing required parameter: ${parameter}`, 'missing_parameter', 400);
  }
}

export class InvalidRequestError extends BridgeError {
  constructor(message: string) {
    super(message, 'invalid_request', 400);
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super(message, 'configuration_error', 500);
  }
}

export class ClientInitError extends BridgeError {
  constructor(userId: number, cause?: unknown) {
    super(`Could not open a homeserver session for user ${userId}`, 'client_init_failed', 502, {
      cause,
    });
  }
}

export const toBridgeError = (err: unknown): BridgeError =>
  err instanceof BridgeError
    ? err
    : new BridgeError(errorMessage(err), 'internal_error', 500, { cause: err });
