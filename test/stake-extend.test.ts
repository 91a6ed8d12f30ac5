import assert from 'assert';
import { describe, it } from 'node:test';

import { DAY, START, createFixture, expectCode } from './helpers.js';

describe('extendStaking', () => {
    it('restarts the lock from now with the level duration', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        f.clock.advance(START + 100n * DAY);

        const { events } = f.registry.extendStaking('alice', 1n);

        assert.strictEqual(f.registry.getStake(1n)?.lockEndTime, START + 280n * DAY);
        assert.strictEqual(events.length, 1);
        assert.strictEqual(events[0].action, 'extended');
        assert.deepStrictEqual(events[0].data, { stakeId: 1n, lockEndTime: START + 280n * DAY });
    });

    it('revives an expired stake', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.mintVehicle(7n, 'garage');
        f.registry.stake('alice', 0, 7n);
        f.clock.advance(START + 200n * DAY);
        assert.strictEqual(f.registry.getBoostPoints(7n), 0n);

        f.registry.extendStaking('alice', 1n);

        assert.strictEqual(f.registry.getBoostPoints(7n), 1000n);
        expectCode(() => f.registry.withdraw('alice', 1n), 'TokensStillLocked');
    });

    it('keeps amount, level and vehicle', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.mintVehicle(7n, 'garage');
        f.registry.stake('alice', 1, 7n);
        f.registry.extendStaking('alice', 1n);

        const stake = f.registry.getStake(1n);
        assert.strictEqual(stake?.amount, 1500n);
        assert.strictEqual(stake?.level, 1);
        assert.strictEqual(stake?.vehicleId, 7n);
        assert.strictEqual(f.ledger.balanceOf('alice'), 8500n);
    });

    it('only the owner may extend', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        expectCode(() => f.registry.extendStaking('bob', 1n), 'InvalidStakeId');
        expectCode(() => f.registry.extendStaking('alice', 9n), 'InvalidStakeId');
    });
});
