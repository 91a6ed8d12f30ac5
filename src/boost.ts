import type { StateCache } from './cache.js';
import type { StakeLevelTable } from './levels.js';
import { stakeKey, vehicleKey } from './utils/deterministic-id.js';
import type { VehicleRegistry } from './vehicles.js';

/**
 * Read side of the registry: the boost a vehicle earns right now.
 */
export class BoostQueryService {
    constructor(
        private readonly cache: StateCache,
        private readonly vehicles: VehicleRegistry,
        private readonly levels: StakeLevelTable
    ) {}

    /**
     * Points of the stake attached to `vehicleId`, or 0 when there is none, the vehicle
     * no longer exists or the lock ended before `now`. A lock ending exactly at `now` still counts.
     */
    pointsFor(vehicleId: bigint, now: bigint): bigint {
        const attachment = this.cache.attachments.findOne(vehicleKey(vehicleId));
        if (!attachment) return 0n;
        if (!this.vehicles.exists(vehicleId)) return 0n;
        const stake = this.cache.stakes.findOne(stakeKey(attachment.stakeId));
        if (!stake || stake.owner === null) return 0n;
        if (stake.lockEndTime < now) return 0n;
        return this.levels.get(stake.level).points;
    }
}
