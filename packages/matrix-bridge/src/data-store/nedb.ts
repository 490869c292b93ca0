import Datastore from '@seald-io/nedb';
import { Logger } from '../logging';
import {
  type BridgeRecord,
  type BridgeStatus,
  type BridgeType,
  recordKey,
} from '../models/bridge-record';
import type { BridgeStore, CredentialStore, MatrixCredentials } from './index';

const log = Logger.get('data-store/NeDB');

type BridgeDocument = BridgeRecord & { key: string };

const openDatastore = async <T>(
  filename: string | undefined,
  uniqueField: keyof T & string
) => {
  const db = new Datastore<T>(filename ? { filename } : { inMemoryOnly: true });

  await db.loadDatabaseAsync();
  await db.ensureIndexAsync({ fieldName: uniqueField, unique: true });

  return db;
};

const toRecord = (doc: BridgeDocument): BridgeRecord => ({
  userId: doc.userId,
  bridgeType: doc.bridgeType,
  status: doc.status,
  roomId: doc.roomId,
  ...(doc.data !== undefined && { data: doc.data }),
  createdAt: doc.createdAt,
});

export class NeDBBridgeStore implements BridgeStore {
  private constructor(private readonly db: Datastore<BridgeDocument>) {}

  /** Opens the store backed by `filename`, or an in-memory one when omitted. */
  public static async open(filename?: string) {
    return new NeDBBridgeStore(await openDatastore<BridgeDocument>(filename, 'key'));
  }

  public async get(userId: number, bridgeType: BridgeType) {
    const doc: BridgeDocument | null = await this.db.findOneAsync({
      key: recordKey(userId, bridgeType),
    });

    return doc && toRecord(doc);
  }

  public async create(record: BridgeRecord) {
    log.debug(
      'create (user=%s; type=%s; status=%s; room=%s)',
      record.userId,
      record.bridgeType,
      record.status,
      record.roomId
    );

    await this.db.insertAsync({ ...record, key: recordKey(record.userId, record.bridgeType) });
  }

  public async delete(userId: number, bridgeType: BridgeType) {
    const removed = await this.db.removeAsync(
      { key: recordKey(userId, bridgeType) },
      { multi: true }
    );

    removed && log.debug('delete (user=%s; type=%s)', userId, bridgeType);
  }

  public async hasActive(userId: number) {
    const count = await this.db.countAsync({ userId, status: 'connected' });

    return count > 0;
  }

  public async listForUser(userId: number) {
    const docs: BridgeDocument[] = await this.db.findAsync({ userId });

    return docs.map(toRecord);
  }

  public async listByStatus(status: BridgeStatus) {
    const docs: BridgeDocument[] = await this.db.findAsync({ status });

    return docs.map(toRecord);
  }
}

export class NeDBCredentialStore implements CredentialStore {
  private constructor(private readonly db: Datastore<MatrixCredentials>) {}

  public static async open(filename?: string) {
    return new NeDBCredentialStore(await openDatastore<MatrixCredentials>(filename, 'userId'));
  }

  public async get(userId: number): Promise<MatrixCredentials | null> {
    const doc: MatrixCredentials | null = await this.db.findOneAsync({ userId });

    return (
      doc && {
        userId: doc.userId,
        matrixUserId: doc.matrixUserId,
        username: doc.username,
        accessToken: doc.accessToken,
        deviceId: doc.deviceId,
      }
    );
  }

  public async save(credentials: MatrixCredentials) {
    log.debug('save credentials (user=%s; username=%s)', credentials.userId, credentials.username);

    await this.db.updateAsync({ userId: credentials.userId }, { ...credentials }, { upsert: true });
  }
}
