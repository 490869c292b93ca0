import { createClient, Method, type MatrixClient } from 'matrix-js-sdk';
import { fetch } from 'undici';
import { z } from 'zod';
import { SYNC_FILE } from '../constants';
import { Logger } from '../logging';
import {
  type MatrixMembersResponse,
  type MatrixMessagesResponse,
  type MatrixSyncResponse,
  readMessage,
  type RoomMessage,
} from '../matrix';
import type { SessionStore } from '../session-store';
import { errorMessage } from '../utils';
import type {
  MediaContent,
  Membership,
  MessagesOptions,
  ProtocolClient,
  RoomMessageListener,
  SyncOptions,
} from './protocol-client';

const log = Logger.get('matrix-client');

// extra time granted to the HTTP request on top of the server-side long poll
const LOCAL_TIMEOUT_MARGIN_MS = 10_000;

export const MatrixSessionSchema = z.object({
  userId: z.string(),
  deviceId: z.string(),
  accessToken: z.string(),
});

export type MatrixSession = z.infer<typeof MatrixSessionSchema>;

const SyncStateSchema = z.object({ nextBatch: z.string() });

const roomPath = (roomId: string, suffix: string) =>
  `/rooms/${encodeURIComponent(roomId)}/${suffix}`;

/** matrix-js-sdk backed client; no crypto, no room cache, no background sync. */
export class MatrixProtocolClient implements ProtocolClient {
  private readonly listeners = new Set<RoomMessageListener>();

  private nextBatch?: string;

  // token of the one-off syncs run while negotiating and monitoring
  private peekBatch?: string;

  private constructor(
    private readonly matrix: MatrixClient,
    private readonly session: MatrixSession,
    private readonly sessions: SessionStore,
    public readonly username: string
  ) {}

  /**
   * Opens a client for `session` and verifies its token with `whoami`.
   * Throws when the homeserver rejects the token.
   */
  public static async connect(
    homeserverUrl: string,
    session: MatrixSession,
    sessions: SessionStore,
    username: string,
    fetchFn?: typeof globalThis.fetch
  ): Promise<MatrixProtocolClient> {
    const matrix = createClient({
      baseUrl: homeserverUrl,
      accessToken: session.accessToken,
      userId: session.userId,
      deviceId: session.deviceId,
      fetchFn,
    });

    const whoami = await matrix.whoami();

    if (whoami.user_id !== session.userId) {
      throw new Error(`Token belongs to ${whoami.user_id}, expected ${session.userId}`);
    }

    const client = new MatrixProtocolClient(matrix, session, sessions, username);

    const state = await sessions.readJson(username, SYNC_FILE, SyncStateSchema);
    client.nextBatch = state?.nextBatch;

    return client;
  }

  public get userId() {
    return this.session.userId;
  }

  public async createRoom(name?: string) {
    const { room_id } = await this.matrix.createRoom({ name });

    return room_id;
  }

  public async invite(roomId: string, userId: string) {
    await this.matrix.invite(roomId, userId);
  }

  public async getMembers(roomId: string, membership: Membership) {
    const response = await this.matrix.http.authedRequest<MatrixMembersResponse>(
      Method.Get,
      roomPath(roomId, 'members'),
      { membership }
    );

    return response.chunk
      .map((event) => event.state_key)
      .filter((stateKey): stateKey is string => typeof stateKey === 'string');
  }

  public async sendText(roomId: string, body: string) {
    const { event_id } = await this.matrix.sendTextMessage(roomId, body);

    return event_id;
  }

  public async getMessages(roomId: string, options: MessagesOptions) {
    const response = await this.matrix.http.authedRequest<MatrixMessagesResponse>(
      Method.Get,
      roomPath(roomId, 'messages'),
      { dir: options.direction, limit: options.limit }
    );

    return response.chunk
      .map((event) => readMessage(event, roomId))
      .filter((message): message is RoomMessage => message !== undefined);
  }

  public async downloadMedia(mxcUrl: string): Promise<MediaContent> {
    const url = this.matrix.mxcUrlToHttp(mxcUrl, undefined, undefined, undefined, false, true, true);

    if (!url) throw new Error(`Invalid media reference: ${mxcUrl}`);

    const response = await fetch(url, {
      headers: { Authorization: `Bearer ${this.session.accessToken}` },
    });

    if (!response.ok) {
      throw new Error(`Media download for ${mxcUrl} failed with status ${response.status}`);
    }

    return {
      data: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get('content-type') ?? 'image/png',
    };
  }

  public async leaveRoom(roomId: string) {
    await this.matrix.leave(roomId);
  }

  public async syncOnce(options: SyncOptions) {
    const deliver = options.deliver ?? false;

    const response = await this.matrix.http.authedRequest<MatrixSyncResponse>(
      Method.Get,
      '/sync',
      {
        timeout: options.timeoutMs,
        full_state: options.fullState ?? false,
        since: deliver ? this.nextBatch : this.peekBatch,
      },
      undefined,
      {
        localTimeoutMs: options.timeoutMs + LOCAL_TIMEOUT_MARGIN_MS,
        abortSignal: options.signal,
      }
    );

    if (!deliver) {
      this.peekBatch = response.next_batch;
      return;
    }

    for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
      for (const event of room.timeline?.events ?? []) {
        const message = readMessage(event, roomId);

        if (message) await this.dispatch(message);
      }
    }

    this.nextBatch = response.next_batch;

    await this.sessions.writeJson(this.username, SYNC_FILE, { nextBatch: response.next_batch });
  }

  public onRoomMessage(listener: RoomMessageListener) {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  public stop() {
    this.listeners.clear();
    this.matrix.stopClient();
  }

  private async dispatch(message: RoomMessage) {
    for (const listener of this.listeners) {
      try {
        await listener(message);
      } catch (err) {
        log.error('Listener failed for event %s: %s', message.eventId, errorMessage(err));
      }
    }
  }
}
