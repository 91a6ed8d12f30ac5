import assert from 'assert';

import { StateCache } from '../src/cache.js';
import { BlockClock } from '../src/clock.js';
import { StakingErrorCode, isStakingError } from '../src/errors.js';
import { CacheTokenLedger } from '../src/ledger.js';
import { StakeLevelTable } from '../src/levels.js';
import { StakeRegistry } from '../src/registry.js';
import { MAX_UINT256 } from '../src/utils/bigint.js';
import { CacheVehicleRegistry } from '../src/vehicles.js';

export const REGISTRY = 'staking-registry';
export const TOKEN_ISSUER = 'token-issuer';
export const VEHICLE_ISSUER = 'vehicle-issuer';
export const DAY = 86400n;
export const START = 1_000_000n;

// level 0: 500 for 180 days, level 1: 1500 for 365 days, level 2: 4000 for 730 days
export function testLevels(): StakeLevelTable {
    return new StakeLevelTable([
        { amount: 500n, lockDuration: 180n * DAY, points: 1000n },
        { amount: 1500n, lockDuration: 365n * DAY, points: 2000n },
        { amount: 4000n, lockDuration: 730n * DAY, points: 3000n },
    ]);
}

export interface Fixture {
    cache: StateCache;
    ledger: CacheTokenLedger;
    vehicles: CacheVehicleRegistry;
    clock: BlockClock;
    registry: StakeRegistry;
    fund(account: string, amount: bigint, allowance?: bigint): void;
    mintVehicle(vehicleId: bigint, owner: string): void;
}

/**
 * Registry over the in-memory ledger and vehicle registry, with the clock at START.
 * With `mirror` it also accepts token and vehicle issuance transactions.
 * Seeding helpers commit their writes so a later rollback keeps them.
 */
export function createFixture(options: { devMode?: boolean; mirror?: boolean } = {}): Fixture {
    const cache = new StateCache();
    const ledger = new CacheTokenLedger(cache);
    const vehicles = new CacheVehicleRegistry(cache);
    const clock = new BlockClock(START);
    const registry = new StakeRegistry({
        cache,
        ledger,
        vehicles,
        clock,
        levels: testLevels(),
        mirror: options.mirror ? { ledger, vehicles, tokenIssuer: TOKEN_ISSUER, vehicleIssuer: VEHICLE_ISSUER } : undefined,
        devMode: options.devMode,
    });
    return {
        cache,
        ledger,
        vehicles,
        clock,
        registry,
        fund(account, amount, allowance = MAX_UINT256) {
            ledger.mint(account, amount);
            ledger.approve(account, REGISTRY, allowance);
            cache.commit();
        },
        mintVehicle(vehicleId, owner) {
            vehicles.mint(vehicleId, owner);
            cache.commit();
        },
    };
}

export function expectCode(fn: () => unknown, code: StakingErrorCode): void {
    assert.throws(fn, (err: unknown) => isStakingError(err, code));
}
