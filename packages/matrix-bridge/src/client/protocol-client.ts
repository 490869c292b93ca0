import type { RoomMessage } from '../matrix';

export type Membership = 'join' | 'invite' | 'leave' | 'ban' | 'knock';

export type Direction = 'b' | 'f';

export interface SyncOptions {
  timeoutMs: number;
  fullState?: boolean;
  signal?: AbortSignal;
  /**
   * Hands timeline messages to the listeners and advances the saved sync
   * token. Only the persistent sync task sets it; other syncs follow a token
   * of their own and deliver nothing.
   */
  deliver?: boolean;
}

export interface MessagesOptions {
  limit: number;
  direction: Direction;
}

export interface MediaContent {
  data: Uint8Array;
  contentType: string;
}

export type RoomMessageListener = (message: RoomMessage) => void | Promise<void>;

/**
 * One user's authenticated session on the homeserver, narrowed to what the
 * connection lifecycle needs.
 */
export interface ProtocolClient {
  /** fully qualified user id of the session */
  readonly userId: string;
  /** localpart; also names the session directory */
  readonly username: string;

  createRoom(name?: string): Promise<string>;

  invite(roomId: string, userId: string): Promise<void>;

  getMembers(roomId: string, membership: Membership): Promise<string[]>;

  sendText(roomId: string, body: string): Promise<string>;

  /** `m.room.message` events only, newest first when `direction` is `b` */
  getMessages(roomId: string, options: MessagesOptions): Promise<RoomMessage[]>;

  downloadMedia(mxcUrl: string): Promise<MediaContent>;

  leaveRoom(roomId: string): Promise<void>;

  /** One sync round; new timeline messages go to the registered listeners. */
  syncOnce(options: SyncOptions): Promise<void>;

  /** Returns a function that removes the listener. */
  onRoomMessage(listener: RoomMessageListener): () => void;

  stop(): void;
}

export interface ClientFactory {
  /** Always builds a new client; never consults or fills the registry. */
  getClient(userId: number): Promise<ProtocolClient>;

  /** The registry's client for the user, else a new uncached one. */
  getCachedClient(userId: number): Promise<ProtocolClient>;

  /** The homeserver username provisioned for the user, if any. */
  usernameFor(userId: number): Promise<string | undefined>;
}
