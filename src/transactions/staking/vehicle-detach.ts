import { invalidExternalId, noActiveStaking, unauthorized } from '../../errors.js';
import logger from '../../logger.js';
import { stakeKey } from '../../utils/deterministic-id.js';
import { StakingContext, attachedStakeId, detachFromStake, saveStake } from './staking-helpers.js';
import { StakeData, VehicleDetachData } from './staking-interfaces.js';

function attachedStake(data: VehicleDetachData, ctx: StakingContext): StakeData {
    const stakeId = attachedStakeId(ctx, data.vehicleId);
    const stake = stakeId === null ? null : ctx.cache.stakes.findOne(stakeKey(stakeId));
    if (!stake) throw noActiveStaking(`vehicle ${data.vehicleId}`);
    return stake;
}

/**
 * The staker may always detach. Anyone else must own the vehicle.
 */
export function validateTx(data: VehicleDetachData, sender: string, ctx: StakingContext): void {
    const stake = attachedStake(data, ctx);
    if (stake.owner === sender) return;

    const lookup = ctx.vehicles.ownerOf(data.vehicleId);
    if (!lookup.ok) {
        logger.warn(`[vehicle-detach:validation] Owner lookup for vehicle ${data.vehicleId} failed: ${lookup.reason}`);
        throw invalidExternalId(data.vehicleId);
    }
    if (lookup.owner !== sender) throw unauthorized(sender, `detach vehicle ${data.vehicleId}`);
}

export function processTx(data: VehicleDetachData, sender: string, ctx: StakingContext): void {
    const stake = attachedStake(data, ctx);
    detachFromStake(ctx, stake);
    saveStake(ctx, stake);
    logger.info(`[vehicle-detach] ${sender} detached vehicle ${data.vehicleId} from stake ${stake._id}`);
}
