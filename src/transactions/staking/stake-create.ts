import { invalidLevel } from '../../errors.js';
import logger from '../../logger.js';
import { assertUint256, checkedAdd } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { StakingContext, attachToStake, depositToEscrow, getOrCreateEscrow, saveStake } from './staking-helpers.js';
import { StakeCreateData, StakeData } from './staking-interfaces.js';

export function validateTx(data: StakeCreateData, sender: string, ctx: StakingContext): void {
    if (!ctx.levels.isValid(data.level)) {
        logger.warn(`[stake-create:validation] Invalid level ${data.level} from ${sender}`);
        throw invalidLevel(data.level);
    }
    assertUint256(data.vehicleId, 'vehicleId');
}

export function processTx(data: StakeCreateData, sender: string, ctx: StakingContext): bigint {
    const level = ctx.levels.get(data.level);
    const stakeId = ctx.cache.nextId('nextStakeId');
    const escrow = getOrCreateEscrow(ctx, sender);

    depositToEscrow(ctx, sender, escrow, level.amount);

    const stake: StakeData = {
        _id: stakeId.toString(),
        level: data.level,
        amount: level.amount,
        lockEndTime: checkedAdd(ctx.now, level.lockDuration),
        vehicleId: 0n,
        owner: sender,
        escrow: escrow.ref,
    };
    logEvent(ctx, sender, {
        action: 'staked',
        data: { stakeId, escrow: escrow.ref, level: data.level, amount: stake.amount, lockEndTime: stake.lockEndTime, points: level.points },
    });

    if (data.vehicleId !== 0n) attachToStake(ctx, stake, data.vehicleId);
    saveStake(ctx, stake);

    logger.info(`[stake-create] ${sender} staked ${level.amount} at level ${data.level} as stake ${stakeId}`);
    return stakeId;
}
