export const BRIDGE_TYPES = ['whatsapp', 'signal', 'telegram', 'messenger'] as const;
export type BridgeType = (typeof BRIDGE_TYPES)[number];

export type BridgeStatus = 'connecting' | 'connected';

export const isBridgeType = (value: string): value is BridgeType =>
  BRIDGE_TYPES.some((type) => type === value);

/**
 * One user's link to one network. The absence of a record means the pair is
 * not connected.
 */
export interface BridgeRecord {
  userId: number;
  bridgeType: BridgeType;
  status: BridgeStatus;
  /** management room shared with the bridge bot */
  roomId: string;
  data?: string;
  /** Unix seconds */
  createdAt: number;
}

export interface BridgeStatusView {
  connected: boolean;
  status: BridgeStatus | 'not_connected';
  createdAt: number;
}

export const toStatusView = (record: BridgeRecord | null): BridgeStatusView =>
  record
    ? { connected: record.status === 'connected', status: record.status, createdAt: record.createdAt }
    : { connected: false, status: 'not_connected', createdAt: 0 };

export const recordKey = (userId: number, bridgeType: BridgeType) => `${userId}:${bridgeType}`;
