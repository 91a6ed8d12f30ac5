import type { StateCache } from './cache.js';
import logger from './logger.js';

export interface VehicleData {
    _id: string; // decimal vehicle id
    owner: string;
}

export type OwnerLookup = { ok: true; owner: string } | { ok: false; reason: 'NOT_FOUND' };

/**
 * Read capability over the external vehicle registry.
 */
export interface VehicleRegistry {
    exists(vehicleId: bigint): boolean;
    ownerOf(vehicleId: bigint): OwnerLookup;
}

export interface MintableVehicleRegistry extends VehicleRegistry {
    mint(vehicleId: bigint, owner: string): boolean;
    burn(vehicleId: bigint): boolean;
    transfer(vehicleId: bigint, to: string): boolean;
}

/**
 * Vehicle registry kept in the state cache, for development nodes and tests.
 */
export class CacheVehicleRegistry implements MintableVehicleRegistry {
    constructor(private readonly cache: StateCache) {}

    exists(vehicleId: bigint): boolean {
        return this.cache.vehicles.has(vehicleId.toString());
    }

    ownerOf(vehicleId: bigint): OwnerLookup {
        const vehicle = this.cache.vehicles.findOne(vehicleId.toString());
        if (!vehicle) return { ok: false, reason: 'NOT_FOUND' };
        return { ok: true, owner: vehicle.owner };
    }

    mint(vehicleId: bigint, owner: string): boolean {
        if (vehicleId === 0n) return false;
        const inserted = this.cache.vehicles.insertOne(vehicleId.toString(), { _id: vehicleId.toString(), owner });
        if (inserted) logger.debug(`[vehicles] Minted vehicle ${vehicleId} to ${owner}`);
        return inserted;
    }

    burn(vehicleId: bigint): boolean {
        return this.cache.vehicles.deleteOne(vehicleId.toString());
    }

    transfer(vehicleId: bigint, to: string): boolean {
        return this.cache.vehicles.updateOne(vehicleId.toString(), { owner: to });
    }
}
