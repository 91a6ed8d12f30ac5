import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { requireVehicleOwner } from './vehicle-helpers.js';
import { VehicleTransferData } from './vehicle-interfaces.js';

// An attached stake keeps the vehicle; the new owner gains the right to detach it.
export function validateTx(data: VehicleTransferData, sender: string, ctx: StakingContext): void {
    requireVehicleOwner(requireMirror(ctx, sender).vehicles, data.vehicleId, sender, 'transfer');
}

export function processTx(data: VehicleTransferData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender).vehicles.transfer(data.vehicleId, data.to);
    logger.debug(`[vehicle-transfer] Vehicle ${data.vehicleId} moved from ${sender} to ${data.to}`);
}
