import logger from '../../logger.js';
import { checkedAdd } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { StakingContext, requireOwnedStake, saveStake } from './staking-helpers.js';
import { StakeExtendData } from './staking-interfaces.js';

export function validateTx(data: StakeExtendData, sender: string, ctx: StakingContext): void {
    requireOwnedStake(ctx, data.stakeId, sender);
}

export function processTx(data: StakeExtendData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    stake.lockEndTime = checkedAdd(ctx.now, ctx.levels.get(stake.level).lockDuration);
    saveStake(ctx, stake);

    logEvent(ctx, sender, { action: 'extended', data: { stakeId: data.stakeId, lockEndTime: stake.lockEndTime } });
    logger.info(`[stake-extend] ${sender} extended stake ${data.stakeId} until ${stake.lockEndTime}`);
}
