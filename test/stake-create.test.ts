import assert from 'assert';
import { describe, it } from 'node:test';

import { DAY, START, createFixture, expectCode } from './helpers.js';

describe('stake', () => {
    it('locks the level amount in a fresh escrow', () => {
        const f = createFixture();
        f.fund('alice', 10000n);

        const { result, events } = f.registry.stake('alice', 0);

        assert.strictEqual(result, 1n);
        assert.deepStrictEqual(f.registry.getStake(1n), {
            _id: '1',
            level: 0,
            amount: 500n,
            lockEndTime: START + 180n * DAY,
            vehicleId: 0n,
            owner: 'alice',
            escrow: 'escrow-1',
        });
        assert.strictEqual(f.ledger.balanceOf('alice'), 9500n);
        assert.strictEqual(f.ledger.balanceOf('escrow-1'), 500n);
        assert.strictEqual(events.length, 1);
        assert.strictEqual(events[0].action, 'staked');
        assert.deepStrictEqual(events[0].data, {
            stakeId: 1n,
            escrow: 'escrow-1',
            level: 0,
            amount: 500n,
            lockEndTime: START + 180n * DAY,
            points: 1000n,
        });
        assert.strictEqual(events[0].actor, 'alice');
        assert.strictEqual(events[0].type, 'staking_staked');
        assert.strictEqual(events[0].timestamp, START);
    });

    it('reuses the staker escrow and numbers stakes in order', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.fund('bob', 10000n);

        assert.strictEqual(f.registry.stake('alice', 0).result, 1n);
        assert.strictEqual(f.registry.stake('bob', 1).result, 2n);
        assert.strictEqual(f.registry.stake('alice', 2).result, 3n);

        assert.strictEqual(f.registry.escrowOf('alice')?.ref, 'escrow-1');
        assert.strictEqual(f.registry.escrowOf('bob')?.ref, 'escrow-2');
        assert.strictEqual(f.ledger.balanceOf('escrow-1'), 4500n);
        assert.strictEqual(f.ledger.balanceOf('escrow-2'), 1500n);
        assert.deepStrictEqual(
            f.registry.stakesOf('alice').map(stake => stake._id),
            ['1', '3']
        );
    });

    it('rejects a level outside the table', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        expectCode(() => f.registry.stake('alice', 3), 'InvalidLevel');
        expectCode(() => f.registry.stake('alice', -1), 'InvalidLevel');
        assert.strictEqual(f.ledger.balanceOf('alice'), 10000n);
    });

    it('fails without an allowance for the registry and leaves no trace', () => {
        const f = createFixture();
        f.fund('alice', 10000n, 0n);

        expectCode(() => f.registry.stake('alice', 0), 'TransferFailed');

        assert.strictEqual(f.registry.getStake(1n), null);
        assert.strictEqual(f.registry.escrowOf('alice'), null);
        assert.strictEqual(f.ledger.balanceOf('alice'), 10000n);
        assert.strictEqual(f.cache.events.size, 0);

        f.ledger.approve('alice', 'staking-registry', 500n);
        f.cache.commit();
        assert.strictEqual(f.registry.stake('alice', 0).result, 1n);
        assert.strictEqual(f.registry.escrowOf('alice')?.ref, 'escrow-1');
        assert.strictEqual(f.ledger.allowance('alice', 'staking-registry'), 0n);
    });

    it('fails when the balance is short', () => {
        const f = createFixture();
        f.fund('alice', 499n);
        expectCode(() => f.registry.stake('alice', 0), 'TransferFailed');
        assert.strictEqual(f.ledger.balanceOf('alice'), 499n);
    });

    it('attaches a vehicle given at creation', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.mintVehicle(7n, 'garage');

        const { events } = f.registry.stake('alice', 1, 7n);

        assert.deepStrictEqual(
            events.map(event => event.action),
            ['staked', 'vehicle_attached']
        );
        assert.strictEqual(f.registry.getStake(1n)?.vehicleId, 7n);
        assert.strictEqual(f.registry.attachedStakeOf(7n), 1n);
        assert.strictEqual(f.registry.getBoostPoints(7n), 2000n);
    });

    it('an unknown vehicle undoes the whole stake', () => {
        const f = createFixture();
        f.fund('alice', 10000n);

        expectCode(() => f.registry.stake('alice', 0, 99n), 'InvalidExternalId');

        assert.strictEqual(f.registry.getStake(1n), null);
        assert.strictEqual(f.registry.escrowOf('alice'), null);
        assert.strictEqual(f.ledger.balanceOf('alice'), 10000n);
        assert.strictEqual(f.cache.counters().nextStakeId, 1n);
    });
});
