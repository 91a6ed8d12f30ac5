import { tokensStillLocked } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import { StakingContext, detachFromStake, findEscrow, isExpired, requireOwnedStake, saveStake } from './staking-helpers.js';
import { StakeWithdrawData } from './staking-interfaces.js';

export function validateTx(data: StakeWithdrawData, sender: string, ctx: StakingContext): void {
    for (const stakeId of data.stakeIds) {
        const stake = requireOwnedStake(ctx, stakeId, sender);
        if (!isExpired(stake, ctx.now)) {
            logger.warn(`[stake-withdraw:validation] Stake ${stakeId} is locked until ${stake.lockEndTime} (now ${ctx.now})`);
            throw tokensStillLocked(stakeId, stake.lockEndTime);
        }
    }
}

/**
 * Withdraws every listed stake. A repeated id fails on its second occurrence, which undoes the whole batch.
 */
export function processTx(data: StakeWithdrawData, sender: string, ctx: StakingContext): bigint {
    let total = 0n;
    for (const stakeId of data.stakeIds) {
        total += withdrawOne(stakeId, sender, ctx);
    }
    return total;
}

function withdrawOne(stakeId: bigint, sender: string, ctx: StakingContext): bigint {
    const stake = requireOwnedStake(ctx, stakeId, sender);
    if (!isExpired(stake, ctx.now)) throw tokensStillLocked(stakeId, stake.lockEndTime);

    detachFromStake(ctx, stake);

    const amount = stake.amount;
    const escrow = findEscrow(ctx, sender);
    if (!escrow) throw new Error(`[stake-withdraw] Stake ${stakeId} has no escrow for ${sender}`);
    escrow.release(ctx.escrowAuthority, amount, sender);

    const points = ctx.levels.get(stake.level).points;
    stake.amount = 0n;
    stake.owner = null;
    stake.escrow = null;
    saveStake(ctx, stake);

    logEvent(ctx, sender, { action: 'withdrawn', data: { stakeId, amount, points } });
    logger.info(`[stake-withdraw] ${sender} withdrew ${amount} from stake ${stakeId}`);
    return amount;
}
