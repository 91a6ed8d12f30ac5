import { invalidExternalId, unauthorized } from '../../errors.js';
import type { MintableVehicleRegistry } from '../../vehicles.js';

/**
 * Only the current owner may hand over or burn a vehicle.
 */
export function requireVehicleOwner(vehicles: MintableVehicleRegistry, vehicleId: bigint, sender: string, action: string): void {
    const lookup = vehicles.ownerOf(vehicleId);
    if (!lookup.ok) throw invalidExternalId(vehicleId);
    if (lookup.owner !== sender) throw unauthorized(sender, `${action} vehicle ${vehicleId}`);
}
