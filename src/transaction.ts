import CryptoJS from 'crypto-js';

import type { StateCache } from './cache.js';
import type { TimeOracle } from './clock.js';
import { EscrowAuthority } from './escrow.js';
import { StakingError } from './errors.js';
import type { TokenLedger } from './ledger.js';
import type { StakeLevelTable } from './levels.js';
import logr from './logger.js';
import type { Transaction, TransactionHandler } from './transactions/index.js';
import type { UpstreamMirror } from './transactions/mirror.js';
import type { StakingContext } from './transactions/staking/staking-helpers.js';
import { TransactionType } from './transactions/types.js';
import type { EventDocument } from './utils/event-logger.js';
import type { VehicleRegistry } from './vehicles.js';

export interface ExecutorDeps {
    cache: StateCache;
    ledger: TokenLedger;
    vehicles: VehicleRegistry;
    levels: StakeLevelTable;
    clock: TimeOracle;
    registryAccount: string;
    mirror: UpstreamMirror | null;
    devMode: boolean;
}

export interface TransactionResult<R> {
    hash: string;
    type: TransactionType;
    sender: string;
    result: R;
    events: EventDocument[];
}

export type CommitListener = (committed: TransactionResult<unknown>) => void;

const bigintReplacer = (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value);

/**
 * Runs one transaction at a time against the state cache: everything the handler
 * changed is committed together, or rolled back together when any step throws.
 */
export class TransactionExecutor {
    private running = false;
    private listeners: CommitListener[] = [];
    private readonly escrowAuthority: EscrowAuthority;

    constructor(private readonly deps: ExecutorDeps) {
        this.escrowAuthority = new EscrowAuthority(deps.registryAccount);
    }

    onCommit(listener: CommitListener): void {
        this.listeners.push(listener);
    }

    createHash<T>(tx: Transaction<T>, nonce: bigint): string {
        return CryptoJS.SHA256(
            JSON.stringify({ type: tx.type, data: tx.data, sender: tx.sender, ts: tx.ts, nonce }, bigintReplacer)
        ).toString();
    }

    execute<T, R>(tx: Transaction<T>, handler: TransactionHandler<T, R>): TransactionResult<R> {
        if (this.running) throw new Error('[transaction] Nested transaction execution is not supported');
        this.running = true;
        const { cache } = this.deps;
        const typeName = TransactionType[tx.type];
        const hash = tx.hash ?? this.createHash(tx, cache.counters().nextEventSeq);
        const ctx: StakingContext = {
            cache,
            ledger: this.deps.ledger,
            vehicles: this.deps.vehicles,
            levels: this.deps.levels,
            now: this.deps.clock.now(),
            registryAccount: this.deps.registryAccount,
            escrowAuthority: this.escrowAuthority,
            mirror: this.deps.mirror,
            devMode: this.deps.devMode,
            transactionId: hash,
        };

        let committed: TransactionResult<R>;
        try {
            handler.validateTx(tx.data, tx.sender, ctx);
            const result = handler.processTx(tx.data, tx.sender, ctx);
            const { events } = cache.commit();
            committed = { hash, type: tx.type, sender: tx.sender, result, events };
        } catch (error) {
            cache.rollback();
            if (error instanceof StakingError) {
                logr.warn(`[transaction] ${typeName} by ${tx.sender} rejected: ${error.code} ${error.message}`);
            } else {
                logr.error(`[transaction] Error during ${typeName} by ${tx.sender}:`, error);
            }
            throw error;
        } finally {
            this.running = false;
        }

        logr.debug(`[transaction] Executed ${typeName} by ${tx.sender} (${committed.events.length} event(s), hash ${hash})`);
        for (const listener of this.listeners) {
            try {
                listener(committed);
            } catch (err) {
                logr.error(`[transaction] Commit listener failed for ${hash}:`, err);
            }
        }
        return committed;
    }
}

export default TransactionExecutor;
