import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { requireVehicleOwner } from './vehicle-helpers.js';
import { VehicleBurnData } from './vehicle-interfaces.js';

export function validateTx(data: VehicleBurnData, sender: string, ctx: StakingContext): void {
    requireVehicleOwner(requireMirror(ctx, sender).vehicles, data.vehicleId, sender, 'burn');
}

/**
 * Removes the vehicle. A stake still attached to it stops earning points and
 * can only be detached by its staker.
 */
export function processTx(data: VehicleBurnData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender).vehicles.burn(data.vehicleId);
    logger.info(`[vehicle-burn] Vehicle ${data.vehicleId} burned by ${sender}`);
}
