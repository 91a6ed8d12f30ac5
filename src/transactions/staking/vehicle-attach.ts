import logger from '../../logger.js';
import { StakingContext, attachToStake, requireOwnedStake, saveStake } from './staking-helpers.js';
import { VehicleAttachData } from './staking-interfaces.js';

export function validateTx(data: VehicleAttachData, sender: string, ctx: StakingContext): void {
    requireOwnedStake(ctx, data.stakeId, sender);
}

export function processTx(data: VehicleAttachData, sender: string, ctx: StakingContext): void {
    const stake = requireOwnedStake(ctx, data.stakeId, sender);
    attachToStake(ctx, stake, data.vehicleId);
    saveStake(ctx, stake);
    logger.info(`[vehicle-attach] Vehicle ${data.vehicleId} attached to stake ${data.stakeId}`);
}
