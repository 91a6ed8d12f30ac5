import { BoostQueryService } from './boost.js';
import { StateCache } from './cache.js';
import type { TimeOracle } from './clock.js';
import config from './config.js';
import type { EscrowView } from './escrow.js';
import type { TokenLedger } from './ledger.js';
import { StakeLevel, StakeLevelTable } from './levels.js';
import { CommitListener, TransactionExecutor, TransactionResult } from './transaction.js';
import { StakingTransaction, Transaction, TransactionHandler, transactionHandlers } from './transactions/index.js';
import type { UpstreamMirror } from './transactions/mirror.js';
import { StakeData } from './transactions/staking/staking-interfaces.js';
import { TransactionType } from './transactions/types.js';
import { stakeKey, vehicleKey } from './utils/deterministic-id.js';
import type { EventDocument } from './utils/event-logger.js';
import type { VehicleRegistry } from './vehicles.js';

export interface StakeRegistryOptions {
    ledger: TokenLedger;
    vehicles: VehicleRegistry;
    clock: TimeOracle;
    cache?: StateCache;
    levels?: StakeLevelTable;
    registryAccount?: string;
    // accept token and vehicle issuance transactions into these collaborators
    mirror?: UpstreamMirror;
    devMode?: boolean;
}

/**
 * Entry point for every staking operation. Each call is one all-or-nothing
 * transaction through the executor; reads go straight to the state cache.
 */
export class StakeRegistry {
    readonly cache: StateCache;
    readonly levelTable: StakeLevelTable;
    readonly registryAccount: string;
    private readonly executor: TransactionExecutor;
    readonly boost: BoostQueryService;
    private readonly ledger: TokenLedger;
    private readonly clock: TimeOracle;

    constructor(options: StakeRegistryOptions) {
        this.cache = options.cache ?? new StateCache();
        this.levelTable = options.levels ?? StakeLevelTable.fromConfig();
        this.registryAccount = options.registryAccount ?? config.registryAccount;
        this.ledger = options.ledger;
        this.clock = options.clock;
        this.executor = new TransactionExecutor({
            cache: this.cache,
            ledger: options.ledger,
            vehicles: options.vehicles,
            levels: this.levelTable,
            clock: options.clock,
            registryAccount: this.registryAccount,
            mirror: options.mirror ?? null,
            devMode: options.devMode ?? false,
        });
        this.boost = new BoostQueryService(this.cache, options.vehicles, this.levelTable);
    }

    /**
     * Called after every committed transaction, in commit order.
     */
    onCommit(listener: CommitListener): void {
        this.executor.onCommit(listener);
    }

    private run<T, R>(type: TransactionType, sender: string, data: T, handler: TransactionHandler<T, R>): TransactionResult<R> {
        const tx: Transaction<T> = { type, sender, data };
        return this.executor.execute(tx, handler);
    }

    stake(caller: string, level: number, vehicleId = 0n): TransactionResult<bigint> {
        return this.run(TransactionType.STAKE_CREATE, caller, { level, vehicleId }, transactionHandlers[TransactionType.STAKE_CREATE]);
    }

    upgradeStake(caller: string, stakeId: bigint, level: number, vehicleId = 0n): TransactionResult<void> {
        return this.run(TransactionType.STAKE_UPGRADE, caller, { stakeId, level, vehicleId }, transactionHandlers[TransactionType.STAKE_UPGRADE]);
    }

    /**
     * Withdraws one stake or a batch. The batch succeeds or fails as a whole; the result is the total released.
     */
    withdraw(caller: string, stakeIds: bigint | bigint[]): TransactionResult<bigint> {
        const ids = Array.isArray(stakeIds) ? stakeIds : [stakeIds];
        return this.run(TransactionType.STAKE_WITHDRAW, caller, { stakeIds: ids }, transactionHandlers[TransactionType.STAKE_WITHDRAW]);
    }

    extendStaking(caller: string, stakeId: bigint): TransactionResult<void> {
        return this.run(TransactionType.STAKE_EXTEND, caller, { stakeId }, transactionHandlers[TransactionType.STAKE_EXTEND]);
    }

    attachVehicle(caller: string, stakeId: bigint, vehicleId: bigint): TransactionResult<void> {
        return this.run(TransactionType.VEHICLE_ATTACH, caller, { stakeId, vehicleId }, transactionHandlers[TransactionType.VEHICLE_ATTACH]);
    }

    detachVehicle(caller: string, vehicleId: bigint): TransactionResult<void> {
        return this.run(TransactionType.VEHICLE_DETACH, caller, { vehicleId }, transactionHandlers[TransactionType.VEHICLE_DETACH]);
    }

    transfer(from: string, to: string, stakeId: bigint): TransactionResult<void> {
        return this.run(TransactionType.STAKE_TRANSFER, from, { stakeId, to }, transactionHandlers[TransactionType.STAKE_TRANSFER]);
    }

    delegate(caller: string, delegatee: string): TransactionResult<void> {
        return this.run(TransactionType.STAKE_DELEGATE, caller, { delegatee }, transactionHandlers[TransactionType.STAKE_DELEGATE]);
    }

    /**
     * The escrow owner redirects the escrow's voting power without going through a stake.
     */
    delegateEscrow(caller: string, escrow: string, delegatee: string): TransactionResult<void> {
        return this.run(TransactionType.ESCROW_DELEGATE, caller, { escrow, delegatee }, transactionHandlers[TransactionType.ESCROW_DELEGATE]);
    }

    setExpiration(caller: string, stakeId: bigint, lockEndTime: bigint): TransactionResult<void> {
        return this.run(
            TransactionType.STAKE_SET_EXPIRATION,
            caller,
            { stakeId, lockEndTime },
            transactionHandlers[TransactionType.STAKE_SET_EXPIRATION]
        );
    }

    /**
     * Applies a decoded transaction, e.g. one read from the ingestion topic.
     */
    submit(tx: StakingTransaction): TransactionResult<unknown> {
        switch (tx.type) {
            case TransactionType.STAKE_CREATE:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_UPGRADE:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_EXTEND:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_WITHDRAW:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_TRANSFER:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_DELEGATE:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.STAKE_SET_EXPIRATION:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.VEHICLE_ATTACH:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.VEHICLE_DETACH:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.ESCROW_DELEGATE:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.TOKEN_MINT:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.TOKEN_TRANSFER:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.TOKEN_APPROVE:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.VEHICLE_MINT:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.VEHICLE_TRANSFER:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
            case TransactionType.VEHICLE_BURN:
                return this.executor.execute(tx, transactionHandlers[tx.type]);
        }
    }

    getBoostPoints(vehicleId: bigint): bigint {
        return this.boost.pointsFor(vehicleId, this.clock.now());
    }

    getBaselinePoints(vehicleId: bigint): bigint {
        return this.boost.pointsFor(vehicleId, this.clock.now());
    }

    getStake(stakeId: bigint): StakeData | null {
        return this.cache.stakes.findOne(stakeKey(stakeId));
    }

    stakesOf(owner: string): StakeData[] {
        return this.cache.stakes.find(stake => stake.owner === owner).sort((a, b) => compareIds(a._id, b._id));
    }

    /**
     * Read-only snapshot of a staker's escrow. Funds only move inside transactions.
     */
    escrowOf(staker: string): EscrowView | null {
        const link = this.cache.escrows.findOne(staker);
        if (!link) return null;
        return { ref: link.escrow, owner: staker, balance: this.ledger.balanceOf(link.escrow), delegatee: this.ledger.delegates(link.escrow) };
    }

    attachedStakeOf(vehicleId: bigint): bigint | null {
        const attachment = this.cache.attachments.findOne(vehicleKey(vehicleId));
        return attachment ? attachment.stakeId : null;
    }

    levels(): readonly StakeLevel[] {
        return this.levelTable.all();
    }

    /**
     * Notifications about one stake, in commit order.
     */
    eventsForStake(stakeId: bigint): EventDocument[] {
        return this.cache.events.find(event => event.stakeId === stakeId).sort((a, b) => (a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0));
    }
}

function compareIds(a: string, b: string): number {
    const x = BigInt(a);
    const y = BigInt(b);
    return x < y ? -1 : x > y ? 1 : 0;
}

export default StakeRegistry;
