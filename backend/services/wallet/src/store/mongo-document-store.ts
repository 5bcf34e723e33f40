import mongoose, { ClientSession, Connection, FilterQuery, Model, Schema } from 'mongoose';
import { logger } from '../utils/logger';
import {
  COLLECTION_NAMES,
  CollectionName,
  Collections,
  compact,
  DocumentField,
  DocumentFilter,
  DocumentNotFoundError,
  DocumentStore,
  DocumentTransaction,
  FindOptions
} from './document-store';
import { decodeRecord } from './record-schemas';

interface StoredDocument {
  _id: string;
}

const isStoredDocument = (raw: unknown): raw is StoredDocument & Record<string, unknown> =>
  typeof raw === 'object' && raw !== null && '_id' in raw && typeof raw._id === 'string';

const INDEXES: Partial<Record<CollectionName, Array<Record<string, 1 | -1>>>> = {
  wallets: [{ walletId: 1 }, { userId: 1 }],
  transactions: [{ ownerId: 1, createdAt: -1 }, { reference: 1 }],
  withdrawals: [{ userId: 1 }, { transferCode: 1 }],
  momo_transactions: [{ userId: 1 }],
  payments: [{ userId: 1 }],
  idempotency_keys: [{ expiresAt: 1 }],
  rate_limits: [{ updatedAt: 1 }],
  audit_logs: [{ userId: 1, timestamp: -1 }]
};

/**
 * DocumentStore over MongoDB. Each collection is a schemaless mongoose model
 * keyed by a string `_id`; records are validated on the way out.
 */
export class MongoDocumentStore implements DocumentStore {
  private readonly models = new Map<CollectionName, Model<StoredDocument>>();

  constructor(private readonly connection: Connection = mongoose.connection) {}

  async ensureIndexes(): Promise<void> {
    for (const collection of COLLECTION_NAMES) {
      await this.model(collection).createIndexes();
    }
    logger.info('MongoDB indexes ensured');
  }

  model(collection: CollectionName): Model<StoredDocument> {
    const existing = this.models.get(collection);
    if (existing) {
      return existing;
    }

    const schema = new Schema<StoredDocument>(
      { _id: { type: String, required: true } },
      { strict: false, versionKey: false, collection }
    );
    for (const index of INDEXES[collection] ?? []) {
      schema.index(index);
    }
    const model = this.connection.model<StoredDocument>(collection, schema);
    this.models.set(collection, model);
    return model;
  }

  decode<C extends CollectionName>(collection: C, raw: unknown): Collections[C] | null {
    if (!isStoredDocument(raw)) {
      return null;
    }
    const { _id, ...fields } = raw;
    return decodeRecord(collection, { ...fields, id: _id });
  }

  encode<C extends CollectionName>(doc: Collections[C]): Record<string, unknown> {
    const { id, ...fields } = doc;
    return { ...compact(fields), _id: id };
  }

  buildFilter<C extends CollectionName>(filter: DocumentFilter<C>): FilterQuery<StoredDocument> {
    const query: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(filter)) {
      if (value !== undefined) {
        query[field === 'id' ? '_id' : field] = value;
      }
    }
    return query;
  }

  async get<C extends CollectionName>(collection: C, id: string, session?: ClientSession): Promise<Collections[C] | null> {
    const raw = await this.model(collection).findById(id).session(session ?? null).lean().exec();
    return this.decode(collection, raw);
  }

  async findOne<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>,
    session?: ClientSession
  ): Promise<Collections[C] | null> {
    const raw = await this.model(collection)
      .findOne(this.buildFilter(filter))
      .session(session ?? null)
      .lean()
      .exec();
    return this.decode(collection, raw);
  }

  async find<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<C>,
    options: FindOptions<C> = {}
  ): Promise<Collections[C][]> {
    let query = this.model(collection).find(this.buildFilter(filter));
    if (options.sortBy) {
      query = query.sort({ [options.sortBy]: options.descending ? -1 : 1 });
    }
    if (options.limit) {
      query = query.limit(options.limit);
    }

    const rows: unknown[] = await query.lean().exec();
    const records: Collections[C][] = [];
    for (const row of rows) {
      const record = this.decode(collection, row);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async set<C extends CollectionName>(collection: C, doc: Collections[C], session?: ClientSession): Promise<void> {
    await this.model(collection)
      .replaceOne({ _id: doc.id }, this.encode(doc), { upsert: true, session })
      .exec();
  }

  async insert<C extends CollectionName>(collection: C, doc: Collections[C]): Promise<void> {
    await this.set(collection, doc);
  }

  async update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<Collections[C]>,
    session?: ClientSession
  ): Promise<void> {
    const result = await this.model(collection)
      .updateOne({ _id: id }, { $set: compact(patch) }, { session })
      .exec();
    if (result.matchedCount === 0) {
      throw new DocumentNotFoundError(collection, id);
    }
  }

  async deleteOlderThan<C extends CollectionName>(
    collection: C,
    field: DocumentField<C>,
    cutoff: Date,
    limit: number
  ): Promise<number> {
    const model = this.model(collection);
    const query: Record<string, unknown> = {};
    query[field] = { $lt: cutoff };

    const stale: unknown[] = await model.find(query).select('_id').limit(limit).lean().exec();
    const ids = stale.filter(isStoredDocument).map((doc) => doc._id);
    if (ids.length === 0) {
      return 0;
    }

    const result = await model.deleteMany({ _id: { $in: ids } }).exec();
    return result.deletedCount;
  }

  async runTransaction<T>(work: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const session = await this.connection.startSession();
    // withTransaction may invoke the callback more than once on transient errors.
    const results: T[] = [];
    try {
      await session.withTransaction(async () => {
        results.length = 0;
        results.push(await work(new MongoTransaction(this, session)));
      });
    } finally {
      await session.endSession();
    }

    if (results.length === 0) {
      throw new Error('Transaction finished without producing a result');
    }
    return results[0];
  }
}

class MongoTransaction implements DocumentTransaction {
  constructor(
    private readonly store: MongoDocumentStore,
    private readonly session: ClientSession
  ) {}

  get<C extends CollectionName>(collection: C, id: string): Promise<Collections[C] | null> {
    return this.store.get(collection, id, this.session);
  }

  findOne<C extends CollectionName>(collection: C, filter: DocumentFilter<C>): Promise<Collections[C] | null> {
    return this.store.findOne(collection, filter, this.session);
  }

  set<C extends CollectionName>(collection: C, doc: Collections[C]): Promise<void> {
    return this.store.set(collection, doc, this.session);
  }

  update<C extends CollectionName>(collection: C, id: string, patch: Partial<Collections[C]>): Promise<void> {
    return this.store.update(collection, id, patch, this.session);
  }
}
