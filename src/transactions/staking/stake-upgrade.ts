import { invalidLevel } from '../../errors.js';
import logger from '../../logger.js';
import { assertUint256, checkedAdd, checkedSub } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { StakingContext, attachToStake, depositToEscrow, detachFromStake, getOrCreateEscrow, requireOwnedStake, saveStake } from './staking-helpers.js';
import { StakeUpgradeData } from './staking-interfaces.js';

export function validateTx(data: StakeUpgradeData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    if (!ctx.levels.isValid(data.level) || data.level <= stake.level) {
        logger.warn(`[stake-upgrade:validation] Stake ${data.stakeId} cannot move from level ${stake.level} to ${data.level}`);
        throw invalidLevel(data.level);
    }
    assertUint256(data.vehicleId, 'vehicleId');
}

export function processTx(data: StakeUpgradeData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    const current = ctx.levels.get(stake.level);
    const next = ctx.levels.get(data.level);
    const amountDiff = checkedSub(next.amount, current.amount);

    const escrow = getOrCreateEscrow(ctx, sender);
    depositToEscrow(ctx, sender, escrow, amountDiff);

    stake.level = data.level;
    stake.amount = checkedAdd(stake.amount, amountDiff);
    stake.lockEndTime = checkedAdd(ctx.now, next.lockDuration);

    if (data.vehicleId === 0n) {
        detachFromStake(ctx, stake);
    } else if (data.vehicleId !== stake.vehicleId) {
        attachToStake(ctx, stake, data.vehicleId);
    }
    saveStake(ctx, stake);

    logEvent(ctx, sender, {
        action: 'upgraded',
        data: { stakeId: data.stakeId, level: data.level, amount: stake.amount, lockEndTime: stake.lockEndTime, points: next.points },
    });
    logger.info(`[stake-upgrade] ${sender} upgraded stake ${data.stakeId} to level ${data.level} (+${amountDiff})`);
}
