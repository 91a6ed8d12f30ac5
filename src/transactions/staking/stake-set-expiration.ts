import { unauthorized } from '../../errors.js';
import logger from '../../logger.js';
import { assertUint256 } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { StakingContext, requireOwnedStake, saveStake } from './staking-helpers.js';
import { StakeSetExpirationData } from './staking-interfaces.js';

// Development override of a stake's lock end; refused unless the node runs in dev mode.

export function validateTx(data: StakeSetExpirationData, sender: string, ctx: StakingContext): void {
    if (!ctx.devMode) {
        logger.warn(`[stake-set-expiration:validation] Rejected for ${sender}: dev mode is off`);
        throw unauthorized(sender, 'set stake expiration');
    }
    requireOwnedStake(ctx, data.stakeId, sender);
    assertUint256(data.lockEndTime, 'lockEndTime');
}

export function processTx(data: StakeSetExpirationData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    stake.lockEndTime = data.lockEndTime;
    saveStake(ctx, stake);

    const escrow = stake.escrow ?? '';
    logEvent(ctx, sender, {
        action: 'staked',
        data: {
            stakeId: data.stakeId,
            escrow,
            level: stake.level,
            amount: stake.amount,
            lockEndTime: stake.lockEndTime,
            points: ctx.levels.get(stake.level).points,
        },
    });
    logger.info(`[stake-set-expiration] Stake ${data.stakeId} now expires at ${data.lockEndTime}`);
}
