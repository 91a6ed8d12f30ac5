import { invalidTransaction, unauthorized } from '../../errors.js';
import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { VehicleMintData } from './vehicle-interfaces.js';

export function validateTx(data: VehicleMintData, sender: string, ctx: StakingContext): void {
    const mirror = requireMirror(ctx, sender);
    if (sender !== mirror.vehicleIssuer) {
        logger.warn(`[vehicle-mint:validation] ${sender} is not the vehicle issuer`);
        throw unauthorized(sender, 'mint vehicles');
    }
    if (mirror.vehicles.exists(data.vehicleId)) throw invalidTransaction(`vehicle ${data.vehicleId} already exists`);
}

export function processTx(data: VehicleMintData, sender: string, ctx: StakingContext): void {
    if (!requireMirror(ctx, sender).vehicles.mint(data.vehicleId, data.to)) {
        throw invalidTransaction(`vehicle ${data.vehicleId} could not be minted`);
    }
    logger.info(`[vehicle-mint] Vehicle ${data.vehicleId} minted to ${data.to}`);
}
