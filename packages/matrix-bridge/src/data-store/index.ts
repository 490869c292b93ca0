import type { BridgeRecord, BridgeStatus, BridgeType } from '../models/bridge-record';

export interface BridgeStore {
  get(userId: number, bridgeType: BridgeType): Promise<BridgeRecord | null>;

  create(record: BridgeRecord): Promise<void>;

  delete(userId: number, bridgeType: BridgeType): Promise<void>;

  /** true when the user has at least one `connected` record */
  hasActive(userId: number): Promise<boolean>;

  listForUser(userId: number): Promise<BridgeRecord[]>;

  listByStatus(status: BridgeStatus): Promise<BridgeRecord[]>;
}

/** A homeserver account provisioned for one user of this service. */
export interface MatrixCredentials {
  userId: number;
  /** fully qualified homeserver user id, `@localpart:server` */
  matrixUserId: string;
  username: string;
  accessToken: string;
  deviceId: string;
}

export interface CredentialStore {
  get(userId: number): Promise<MatrixCredentials | null>;

  save(credentials: MatrixCredentials): Promise<void>;
}
