import type { StateCache } from '../../cache.js';
import { EscrowAccount, EscrowAuthority, ledgerTransfer } from '../../escrow.js';
import { alreadyAttached, invalidExternalId, invalidStakeId } from '../../errors.js';
import type { TokenLedger } from '../../ledger.js';
import type { StakeLevelTable } from '../../levels.js';
import logger from '../../logger.js';
import { escrowRef, stakeKey, vehicleKey } from '../../utils/deterministic-id.js';
import { logEvent } from '../../utils/event-logger.js';
import type { VehicleRegistry } from '../../vehicles.js';
import type { UpstreamMirror } from '../mirror.js';
import { StakeData } from './staking-interfaces.js';

/**
 * Everything a staking handler may touch while a transaction runs.
 */
export interface StakingContext {
    cache: StateCache;
    ledger: TokenLedger;
    vehicles: VehicleRegistry;
    levels: StakeLevelTable;
    now: bigint;
    registryAccount: string;
    escrowAuthority: EscrowAuthority;
    // set when the node keeps the token ledger and vehicle registry itself
    mirror: UpstreamMirror | null;
    devMode: boolean;
    transactionId?: string;
}

export function isExpired(stake: StakeData, now: bigint): boolean {
    return now > stake.lockEndTime;
}

export function stakeIdOf(stake: StakeData): bigint {
    return BigInt(stake._id);
}

/**
 * Loads a live stake owned by `caller`. Missing, withdrawn and foreign stakes all fail the same way.
 */
export function requireOwnedStake(ctx: StakingContext, stakeId: bigint, caller: string): StakeData {
    const stake = ctx.cache.stakes.findOne(stakeKey(stakeId));
    if (!stake || stake.owner === null || stake.owner !== caller) {
        throw invalidStakeId(stakeId);
    }
    return stake;
}

export function saveStake(ctx: StakingContext, stake: StakeData): void {
    ctx.cache.stakes.upsertOne(stake._id, stake);
}

export function findEscrow(ctx: StakingContext, staker: string): EscrowAccount | null {
    const link = ctx.cache.escrows.findOne(staker);
    return link ? new EscrowAccount(link.escrow, staker, ctx.ledger, ctx.escrowAuthority) : null;
}

export function findEscrowByRef(ctx: StakingContext, ref: string): EscrowAccount | null {
    const [link] = ctx.cache.escrows.find(candidate => candidate.escrow === ref);
    return link ? new EscrowAccount(link.escrow, link._id, ctx.ledger, ctx.escrowAuthority) : null;
}

/**
 * Returns the staker's escrow, creating it on first use. Escrows are never destroyed.
 */
export function getOrCreateEscrow(ctx: StakingContext, staker: string): EscrowAccount {
    const existing = findEscrow(ctx, staker);
    if (existing) return existing;
    const ref = escrowRef(ctx.cache.nextId('nextEscrowId'));
    ctx.cache.escrows.insertOne(staker, { _id: staker, escrow: ref, createdAt: ctx.now });
    logger.debug(`[staking] Created escrow ${ref} for ${staker}`);
    return new EscrowAccount(ref, staker, ctx.ledger, ctx.escrowAuthority);
}

/**
 * Pulls `amount` from the staker into their escrow through the registry's allowance.
 */
export function depositToEscrow(ctx: StakingContext, staker: string, escrow: EscrowAccount, amount: bigint): void {
    ledgerTransfer(staker, escrow.ref, amount, () => ctx.ledger.transferFrom(ctx.registryAccount, staker, escrow.ref, amount));
}

export function attachedStakeId(ctx: StakingContext, vehicleId: bigint): bigint | null {
    const attachment = ctx.cache.attachments.findOne(vehicleKey(vehicleId));
    return attachment ? attachment.stakeId : null;
}

/**
 * Clears the stake's vehicle in both directions and notifies the stake's owner.
 * The caller persists `stake`.
 */
export function detachFromStake(ctx: StakingContext, stake: StakeData): void {
    const vehicleId = stake.vehicleId;
    if (vehicleId === 0n) return;
    ctx.cache.attachments.deleteOne(vehicleKey(vehicleId));
    stake.vehicleId = 0n;
    logEvent(ctx, stake.owner ?? '', { action: 'vehicle_detached', data: { stakeId: stakeIdOf(stake), vehicleId } });
}

/**
 * Binds `vehicleId` to `stake`. A holder whose lock has run out gives the vehicle
 * up; a live holder, or the stake itself, makes it fail. The stake's previous
 * vehicle is released first. The caller persists `stake`.
 */
export function attachToStake(ctx: StakingContext, stake: StakeData, vehicleId: bigint): void {
    if (vehicleId === 0n || !ctx.vehicles.exists(vehicleId)) throw invalidExternalId(vehicleId);
    const stakeId = stakeIdOf(stake);

    const holderId = attachedStakeId(ctx, vehicleId);
    if (holderId !== null) {
        if (holderId === stakeId) throw alreadyAttached(vehicleId, holderId);
        const holder = ctx.cache.stakes.findOne(stakeKey(holderId));
        if (holder && !isExpired(holder, ctx.now)) throw alreadyAttached(vehicleId, holderId);
        if (holder) {
            detachFromStake(ctx, holder);
            saveStake(ctx, holder);
        } else {
            ctx.cache.attachments.deleteOne(vehicleKey(vehicleId));
        }
        logger.debug(`[staking] Vehicle ${vehicleId} taken over from expired stake ${holderId}`);
    }

    if (stake.vehicleId !== 0n) detachFromStake(ctx, stake);

    ctx.cache.attachments.insertOne(vehicleKey(vehicleId), { _id: vehicleKey(vehicleId), stakeId });
    stake.vehicleId = vehicleId;
    logEvent(ctx, stake.owner ?? '', { action: 'vehicle_attached', data: { stakeId, vehicleId } });
}
