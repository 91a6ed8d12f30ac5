import { AnyBulkWriteOperation, Db, MongoClient } from 'mongodb';

import { CacheCollection, CollectionWrite, StateBatch, StateCache, StateStore } from './cache.js';
import logger from './logger.js';
import settings from './settings.js';
import {
    DocumentCodec,
    accountCodec,
    attachmentCodec,
    counterCodec,
    escrowCodec,
    eventCodec,
    stakeCodec,
    vehicleCodec,
} from './utils/db-codec.js';

interface StoredDocument {
    _id: string;
    [field: string]: unknown;
}

/**
 * MongoDB persistence for the state cache. Each cache collection maps to a
 * Mongo collection of the same name.
 */
export class MongoStateStore implements StateStore {
    private constructor(
        private readonly client: MongoClient,
        readonly db: Db
    ) {}

    static async connect(url = settings.mongoUrl, dbName = settings.mongoDb): Promise<MongoStateStore> {
        const client = new MongoClient(url, {});
        await client.connect();
        const store = new MongoStateStore(client, client.db(dbName));
        logger.info(`Connected to ${url}/${store.db.databaseName}`);
        return store;
    }

    async addMongoIndexes(): Promise<void> {
        try {
            logger.debug('[DB Indexes] Creating indexes for stakes collection...');
            const stakes = this.db.collection('stakes');
            await stakes.createIndex({ owner: 1 });
            await stakes.createIndex({ vehicleId: 1 });
            await stakes.createIndex({ lockEndTime: 1 });

            logger.debug('[DB Indexes] Creating indexes for events collection...');
            const events = this.db.collection('events');
            await events.createIndex({ seq: 1 });
            await events.createIndex({ stakeId: 1, seq: 1 });
            await events.createIndex({ actor: 1 });
            await events.createIndex({ type: 1 });

            logger.debug('[DB Indexes] Creating indexes for vehicles collection...');
            await this.db.collection('vehicles').createIndex({ owner: 1 });

            logger.debug('MongoDB indexes ensured for all relevant collections.');
        } catch (indexError) {
            logger.error('Error creating MongoDB indexes:', indexError);
        }
    }

    /**
     * Fills an empty cache with the stored state. Returns the number of documents loaded.
     */
    async loadInto(cache: StateCache): Promise<number> {
        let total = 0;
        total += await this.loadCollection(cache.stakes, stakeCodec);
        total += await this.loadCollection(cache.escrows, escrowCodec);
        total += await this.loadCollection(cache.attachments, attachmentCodec);
        total += await this.loadCollection(cache.accounts, accountCodec);
        total += await this.loadCollection(cache.vehicles, vehicleCodec);
        total += await this.loadCollection(cache.state, counterCodec);
        total += await this.loadCollection(cache.events, eventCodec);
        logger.info(`[mongo] Loaded ${total} document(s) into the state cache`);
        return total;
    }

    async apply(batch: StateBatch): Promise<void> {
        await this.writeCollection('stakes', batch.stakes, stakeCodec);
        await this.writeCollection('escrows', batch.escrows, escrowCodec);
        await this.writeCollection('attachments', batch.attachments, attachmentCodec);
        await this.writeCollection('accounts', batch.accounts, accountCodec);
        await this.writeCollection('vehicles', batch.vehicles, vehicleCodec);
        await this.writeCollection('state', batch.state, counterCodec);
        await this.writeCollection('events', batch.events, eventCodec);
    }

    async close(): Promise<void> {
        await this.client.close();
        logger.info('[mongo] Connection closed');
    }

    private async loadCollection<T extends { _id: string }>(target: CacheCollection<T>, codec: DocumentCodec<T>): Promise<number> {
        const entries: Array<[string, T]> = [];
        for await (const raw of this.db.collection<StoredDocument>(target.name).find({})) {
            const doc = codec.decode(raw);
            entries.push([doc._id, doc]);
        }
        const count = target.load(entries);
        logger.debug(`[mongo] Loaded ${count} document(s) from '${target.name}'`);
        return count;
    }

    private async writeCollection<T>(name: string, writes: CollectionWrite<T>, codec: DocumentCodec<T>): Promise<void> {
        const ops: AnyBulkWriteOperation<StoredDocument>[] = [];
        for (const { key, doc } of writes.upserts) {
            ops.push({ replaceOne: { filter: { _id: key }, replacement: codec.encode(doc), upsert: true } });
        }
        for (const key of writes.deletes) {
            ops.push({ deleteOne: { filter: { _id: key } } });
        }
        if (ops.length === 0) return;
        const result = await this.db.collection<StoredDocument>(name).bulkWrite(ops, { ordered: true });
        logger.trace(`[mongo] ${name}: ${result.upsertedCount + result.modifiedCount} upserted/modified, ${result.deletedCount} deleted`);
    }
}

export default MongoStateStore;
