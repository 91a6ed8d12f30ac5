import cloneDeep from 'clone-deep';

import type { LedgerAccountData } from './ledger.js';
import logger from './logger.js';
import type { AttachmentData, StakeData, StakerEscrowData } from './transactions/staking/staking-interfaces.js';
import type { EventDocument } from './utils/event-logger.js';
import type { VehicleData } from './vehicles.js';

export interface CounterState {
    _id: string;
    nextStakeId: bigint;
    nextEscrowId: bigint;
    nextEventSeq: bigint;
}

export type CounterName = 'nextStakeId' | 'nextEscrowId' | 'nextEventSeq';

export const COUNTERS_KEY = 'counters';

export interface CollectionWrite<T> {
    upserts: Array<{ key: string; doc: T }>;
    deletes: string[];
}

export interface StateBatch {
    stakes: CollectionWrite<StakeData>;
    escrows: CollectionWrite<StakerEscrowData>;
    attachments: CollectionWrite<AttachmentData>;
    accounts: CollectionWrite<LedgerAccountData>;
    vehicles: CollectionWrite<VehicleData>;
    state: CollectionWrite<CounterState>;
    events: CollectionWrite<EventDocument>;
}

/**
 * Persistence target for committed cache state.
 */
export interface StateStore {
    apply(batch: StateBatch): Promise<void>;
}

interface Journaled {
    readonly name: string;
    commit(): string[];
    rollback(): void;
}

/**
 * Keyed in-memory collection with a copy-on-first-write journal.
 * Reads hand out clones, so callers never mutate live documents.
 */
export class CacheCollection<T extends object> implements Journaled {
    private docs = new Map<string, T>();
    // first-write copies for the running transaction; null marks a key that did not exist
    private copy = new Map<string, T | null>();
    private inserts: string[] = [];
    private dirty = new Set<string>();

    constructor(readonly name: string) {}

    get size(): number {
        return this.docs.size;
    }

    has(key: string): boolean {
        return this.docs.has(key);
    }

    findOne(key: string): T | null {
        const doc = this.docs.get(key);
        return doc ? cloneDeep(doc) : null;
    }

    find(predicate?: (doc: T, key: string) => boolean): T[] {
        const result: T[] = [];
        for (const [key, doc] of this.docs) {
            if (!predicate || predicate(doc, key)) result.push(cloneDeep(doc));
        }
        return result;
    }

    insertOne(key: string, doc: T): boolean {
        if (this.docs.has(key)) return false;
        this.journal(key);
        this.docs.set(key, cloneDeep(doc));
        this.inserts.push(key);
        return true;
    }

    updateOne(key: string, changes: Partial<T>): boolean {
        const current = this.docs.get(key);
        if (!current) return false;
        this.journal(key);
        this.docs.set(key, { ...current, ...cloneDeep(changes) });
        return true;
    }

    upsertOne(key: string, doc: T): void {
        this.journal(key);
        if (!this.docs.has(key)) this.inserts.push(key);
        this.docs.set(key, cloneDeep(doc));
    }

    deleteOne(key: string): boolean {
        if (!this.docs.has(key)) return false;
        this.journal(key);
        this.docs.delete(key);
        return true;
    }

    /**
     * Seeds documents read from the store. Loaded documents are clean.
     */
    load(entries: Iterable<[string, T]>): number {
        let count = 0;
        for (const [key, doc] of entries) {
            this.docs.set(key, doc);
            count++;
        }
        return count;
    }

    /**
     * Accepts the running transaction. Returns the keys inserted by it, in order.
     */
    commit(): string[] {
        for (const key of this.copy.keys()) this.dirty.add(key);
        const inserted = this.inserts;
        this.copy.clear();
        this.inserts = [];
        return inserted;
    }

    rollback(): void {
        for (const [key, previous] of this.copy) {
            if (previous === null) this.docs.delete(key);
            else this.docs.set(key, previous);
        }
        this.copy.clear();
        this.inserts = [];
    }

    takeWrites(): CollectionWrite<T> {
        const writes: CollectionWrite<T> = { upserts: [], deletes: [] };
        for (const key of this.dirty) {
            const doc = this.docs.get(key);
            if (doc) writes.upserts.push({ key, doc: cloneDeep(doc) });
            else writes.deletes.push(key);
        }
        this.dirty.clear();
        return writes;
    }

    markDirty(writes: CollectionWrite<T>): void {
        for (const { key } of writes.upserts) this.dirty.add(key);
        for (const key of writes.deletes) this.dirty.add(key);
    }

    private journal(key: string): void {
        if (this.copy.has(key)) return;
        const current = this.docs.get(key);
        this.copy.set(key, current ? cloneDeep(current) : null);
    }
}

export interface CommitResult {
    events: EventDocument[];
}

/**
 * The single state aggregate. Every registry operation and the built-in ledger
 * read and write through it, so one rollback restores all of them together.
 */
export class StateCache {
    readonly stakes = new CacheCollection<StakeData>('stakes');
    readonly escrows = new CacheCollection<StakerEscrowData>('escrows');
    readonly attachments = new CacheCollection<AttachmentData>('attachments');
    readonly accounts = new CacheCollection<LedgerAccountData>('accounts');
    readonly vehicles = new CacheCollection<VehicleData>('vehicles');
    readonly state = new CacheCollection<CounterState>('state');
    readonly events = new CacheCollection<EventDocument>('events');

    private collections(): Journaled[] {
        return [this.stakes, this.escrows, this.attachments, this.accounts, this.vehicles, this.state, this.events];
    }

    counters(): CounterState {
        return this.state.findOne(COUNTERS_KEY) ?? { _id: COUNTERS_KEY, nextStakeId: 1n, nextEscrowId: 1n, nextEventSeq: 1n };
    }

    /**
     * Returns the current value of a counter and advances it. Counters roll back with everything else.
     */
    nextId(counter: CounterName): bigint {
        const current = this.counters();
        const value = current[counter];
        const next: CounterState = { ...current };
        next[counter] = value + 1n;
        this.state.upsertOne(COUNTERS_KEY, next);
        return value;
    }

    commit(): CommitResult {
        let insertedEvents: string[] = [];
        for (const collection of this.collections()) {
            const inserted = collection.commit();
            if (collection === this.events) insertedEvents = inserted;
        }
        const events: EventDocument[] = [];
        for (const key of insertedEvents) {
            const doc = this.events.findOne(key);
            if (doc) events.push(doc);
        }
        logger.debug(`[cache] Committed transaction with ${events.length} event(s)`);
        return { events };
    }

    rollback(): void {
        for (const collection of this.collections()) collection.rollback();
        logger.debug('[cache] Rolled back transaction');
    }

    takeWrites(): StateBatch {
        return {
            stakes: this.stakes.takeWrites(),
            escrows: this.escrows.takeWrites(),
            attachments: this.attachments.takeWrites(),
            accounts: this.accounts.takeWrites(),
            vehicles: this.vehicles.takeWrites(),
            state: this.state.takeWrites(),
            events: this.events.takeWrites(),
        };
    }

    /**
     * Flushes every committed change to the store. On failure the changes stay pending for the next flush.
     */
    async writeToDisk(store: StateStore): Promise<number> {
        const batch = this.takeWrites();
        const count = countWrites(batch);
        if (count === 0) {
            logger.debug('[cache] No DB operations for this batch.');
            return 0;
        }
        const timeBefore = Date.now();
        try {
            await store.apply(batch);
        } catch (err) {
            this.stakes.markDirty(batch.stakes);
            this.escrows.markDirty(batch.escrows);
            this.attachments.markDirty(batch.attachments);
            this.accounts.markDirty(batch.accounts);
            this.vehicles.markDirty(batch.vehicles);
            this.state.markDirty(batch.state);
            this.events.markDirty(batch.events);
            logger.error(`[cache] writeToDisk failed, ${count} op(s) kept pending: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        }
        logger.debug(`[cache] DB batch took ${Date.now() - timeBefore}ms for ${count} op(s).`);
        return count;
    }
}

export function countWrites(batch: StateBatch): number {
    const parts = [batch.stakes, batch.escrows, batch.attachments, batch.accounts, batch.vehicles, batch.state, batch.events];
    let count = 0;
    for (const writes of parts) count += writes.upserts.length + writes.deletes.length;
    return count;
}

export default StateCache;
