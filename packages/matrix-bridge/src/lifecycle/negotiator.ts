import type { ProtocolClient } from '../client/protocol-client';
import type { PollingConfig } from '../constants';
import type { RequestLogger } from '../logging';
import { isTextual } from '../matrix';
import {
  ArtifactTimeoutError,
  BotJoinFailedError,
  BridgeBotError,
} from '../models/errors';
import { type NetworkProfile, renderCommand } from '../models/network';
import { extractArtifact, type RawArtifact } from '../models/pairing';
import { sleep } from '../utils';

export interface NegotiationRequest {
  botUserId: string;
  profile: NetworkProfile;
  param?: string;
  polling: PollingConfig;
  log: RequestLogger;
}

export interface NegotiationResult {
  roomId: string;
  artifact: RawArtifact;
}

const waitForBot = async (client: ProtocolClient, roomId: string, request: NegotiationRequest) => {
  const { botUserId, polling, log } = request;

  await client.syncOnce({ timeoutMs: polling.inviteSyncTimeoutMs });

  for (let attempt = 1; attempt <= polling.joinAttempts; attempt++) {
    const members = await client.getMembers(roomId, 'join');

    if (members.includes(botUserId)) {
      log.debug('Bot joined after %s checks', attempt);
      return;
    }

    if (attempt < polling.joinAttempts) await sleep(polling.joinIntervalMs);
  }

  throw new BotJoinFailedError(botUserId, roomId);
};

const awaitArtifact = async (
  client: ProtocolClient,
  roomId: string,
  request: NegotiationRequest
): Promise<RawArtifact> => {
  const { botUserId, profile, polling } = request;

  for (let attempt = 1; attempt <= polling.artifactAttempts; attempt++) {
    await client.syncOnce({ timeoutMs: polling.artifactSyncTimeoutMs });

    const messages = await client.getMessages(roomId, {
      limit: polling.messageLimit,
      direction: 'b',
    });

    for (const message of messages) {
      if (message.sender !== botUserId) continue;

      const artifact = extractArtifact(message, profile.artifacts);

      if (artifact) return artifact;

      if (isTextual(message) && message.body.includes('error')) {
        throw new BridgeBotError(message.body);
      }
    }

    if (attempt < polling.artifactAttempts) await sleep(polling.artifactIntervalMs);
  }

  throw new ArtifactTimeoutError(polling.artifactAttempts);
};

/**
 * Opens a management room with the bridge bot, asks it to start a login and
 * waits for the pairing artifact it answers with.
 */
export const negotiate = async (
  client: ProtocolClient,
  request: NegotiationRequest
): Promise<NegotiationResult> => {
  const { botUserId, profile, param, log } = request;

  // fail on a missing parameter before anything is created
  const loginCommand = renderCommand(profile, profile.loginCommand, param);

  const roomId = await client.createRoom(`${profile.displayName} Bridge`);

  log.info('Created management room %s', roomId);

  await client.invite(roomId, botUserId);

  await waitForBot(client, roomId, request);

  if (profile.cancelCommand) {
    await client.sendText(roomId, renderCommand(profile, profile.cancelCommand, param));
  }

  await client.sendText(roomId, loginCommand);

  const artifact = await awaitArtifact(client, roomId, request);

  log.info('Received %s from bridge bot', artifact.kind);

  return { roomId, artifact };
};
