import { invalidTransaction } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { StakingContext, findEscrow, getOrCreateEscrow, requireOwnedStake, saveStake } from './staking-helpers.js';
import { StakeTransferData } from './staking-interfaces.js';

export function validateTx(data: StakeTransferData, sender: string, ctx: StakingContext): void {
    requireOwnedStake(ctx, data.stakeId, sender);
    if (!validate.account(data.to)) {
        logger.warn(`[stake-transfer:validation] Invalid recipient ${data.to}`);
        throw invalidTransaction(`invalid recipient ${data.to}`);
    }
}

/**
 * Hands the stake to `data.to`. Amount, level, lock end and attachment stay as they are.
 */
export function processTx(data: StakeTransferData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    const points = ctx.levels.get(stake.level).points;

    const fromEscrow = findEscrow(ctx, sender);
    if (!fromEscrow) throw new Error(`[stake-transfer] Stake ${data.stakeId} has no escrow for ${sender}`);
    const toEscrow = getOrCreateEscrow(ctx, data.to);
    if (toEscrow.ref !== fromEscrow.ref) {
        fromEscrow.move(ctx.escrowAuthority, stake.amount, toEscrow);
    }

    stake.owner = data.to;
    stake.escrow = toEscrow.ref;
    saveStake(ctx, stake);

    logEvent(ctx, sender, { action: 'withdrawn', data: { stakeId: data.stakeId, amount: stake.amount, points } });
    logEvent(ctx, data.to, {
        action: 'staked',
        data: { stakeId: data.stakeId, escrow: toEscrow.ref, level: stake.level, amount: stake.amount, lockEndTime: stake.lockEndTime, points },
    });
    logger.info(`[stake-transfer] Stake ${data.stakeId} moved from ${sender} to ${data.to}`);
}
