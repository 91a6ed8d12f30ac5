import assert from 'assert';
import { describe, it } from 'node:test';

import { createFixture, expectCode } from './helpers.js';

function attached() {
    const f = createFixture();
    f.fund('alice', 10000n);
    f.mintVehicle(7n, 'garage');
    f.registry.stake('alice', 0, 7n);
    return f;
}

describe('detachVehicle', () => {
    it('the staker may detach', () => {
        const f = attached();

        const { events } = f.registry.detachVehicle('alice', 7n);

        assert.strictEqual(events.length, 1);
        assert.strictEqual(events[0].action, 'vehicle_detached');
        assert.strictEqual(events[0].actor, 'alice');
        assert.deepStrictEqual(events[0].data, { stakeId: 1n, vehicleId: 7n });
        assert.strictEqual(f.registry.attachedStakeOf(7n), null);
        assert.strictEqual(f.registry.getStake(1n)?.vehicleId, 0n);
        assert.strictEqual(f.registry.getBoostPoints(7n), 0n);
    });

    it('the vehicle owner may detach and the staker is notified', () => {
        const f = attached();
        const { events } = f.registry.detachVehicle('garage', 7n);
        assert.strictEqual(events[0].actor, 'alice');
        assert.strictEqual(f.registry.attachedStakeOf(7n), null);
    });

    it('follows ownership changes of the vehicle', () => {
        const f = attached();
        f.vehicles.transfer(7n, 'dealer');
        f.cache.commit();
        expectCode(() => f.registry.detachVehicle('garage', 7n), 'Unauthorized');
        f.registry.detachVehicle('dealer', 7n);
        assert.strictEqual(f.registry.attachedStakeOf(7n), null);
    });

    it('anyone else is refused', () => {
        const f = attached();
        expectCode(() => f.registry.detachVehicle('mallory', 7n), 'Unauthorized');
        assert.strictEqual(f.registry.attachedStakeOf(7n), 1n);
    });

    it('a vehicle gone from the registry can only be detached by the staker', () => {
        const f = attached();
        f.vehicles.burn(7n);
        f.cache.commit();
        expectCode(() => f.registry.detachVehicle('garage', 7n), 'InvalidExternalId');
        f.registry.detachVehicle('alice', 7n);
        assert.strictEqual(f.registry.attachedStakeOf(7n), null);
    });

    it('an unattached vehicle has nothing to detach', () => {
        const f = attached();
        f.mintVehicle(8n, 'garage');
        expectCode(() => f.registry.detachVehicle('garage', 8n), 'NoActiveStaking');
        f.registry.detachVehicle('alice', 7n);
        expectCode(() => f.registry.detachVehicle('alice', 7n), 'NoActiveStaking');
    });
});
