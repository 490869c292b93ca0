import { isRecord } from './utils';

export interface RoomEvent {
  event_id: string;
  sender: string;
  type: string;
  state_key?: string;
  room_id?: string;
  content: Record<string, unknown>;
  origin_server_ts: number;
}

export interface MatrixMessagesResponse {
  chunk: RoomEvent[];
  start: string;
  end?: string;
}

export interface MatrixMembersResponse {
  chunk: RoomEvent[];
}

export interface MatrixJoinedRoom {
  timeline?: {
    events: RoomEvent[];
  };
}

export interface MatrixSyncResponse {
  next_batch: string;
  rooms?: {
    join?: Record<string, MatrixJoinedRoom>;
  };
}

export type MessageKind = 'text' | 'notice' | 'image' | 'other';

/** An `m.room.message` event reduced to what the lifecycle inspects. */
export interface RoomMessage {
  eventId: string;
  roomId: string;
  sender: string;
  /** milliseconds since the epoch */
  timestamp: number;
  kind: MessageKind;
  msgtype: string;
  body: string;
  /** plain (unencrypted) media reference, for images */
  url?: string;
  mimetype?: string;
}

const KINDS: Record<string, MessageKind> = {
  'm.text': 'text',
  'm.notice': 'notice',
  'm.image': 'image',
};

export const isTextual = (message: RoomMessage) =>
  message.kind === 'text' || message.kind === 'notice';

/**
 * Reads an `m.room.message` event. Returns undefined for other event types and
 * for redacted or malformed messages.
 */
export const readMessage = (event: RoomEvent, roomId?: string): RoomMessage | undefined => {
  if (event.type !== 'm.room.message') return;

  const { msgtype, body, url, info } = event.content;

  if (typeof msgtype !== 'string') return;

  const room = event.room_id ?? roomId;

  if (!room) return;

  return {
    eventId: event.event_id,
    roomId: room,
    sender: event.sender,
    timestamp: event.origin_server_ts,
    kind: KINDS[msgtype] ?? 'other',
    msgtype,
    body: typeof body === 'string' ? body : '',
    url: typeof url === 'string' ? url : undefined,
    mimetype: isRecord(info) && typeof info.mimetype === 'string' ? info.mimetype : undefined,
  };
};
