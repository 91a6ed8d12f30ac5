import assert from 'assert';
import { describe, it } from 'node:test';

import { DAY, START, createFixture, expectCode } from './helpers.js';

describe('delegate', () => {
    it('needs an escrow', () => {
        const f = createFixture();
        expectCode(() => f.registry.delegate('alice', 'carol'), 'NoActiveStaking');
    });

    it('forwards the escrow voting power', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 1);

        const { events } = f.registry.delegate('alice', 'carol');

        assert.strictEqual(f.ledger.delegates('escrow-1'), 'carol');
        assert.strictEqual(f.ledger.getVotes('carol'), 1500n);
        assert.strictEqual(events.length, 1);
        assert.strictEqual(events[0].action, 'delegated');
        assert.strictEqual(events[0].stakeId, null);
        assert.deepStrictEqual(events[0].data, { escrow: 'escrow-1', delegatee: 'carol' });
    });

    it('new stakes add to the delegatee votes', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        f.registry.delegate('alice', 'carol');
        f.registry.stake('alice', 1);
        assert.strictEqual(f.ledger.getVotes('carol'), 2000n);
    });

    it('delegation outlives a fully withdrawn escrow', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        f.registry.delegate('alice', 'carol');
        f.clock.advance(START + 181n * DAY);
        f.registry.withdraw('alice', 1n);
        assert.strictEqual(f.ledger.getVotes('carol'), 0n);

        f.registry.stake('alice', 0);
        assert.strictEqual(f.registry.getStake(2n)?.escrow, 'escrow-1');
        assert.strictEqual(f.ledger.getVotes('carol'), 500n);
    });

    it('refuses a delegatee that is not a user account', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        expectCode(() => f.registry.delegate('alice', 'escrow-2'), 'InvalidTransaction');
    });
});

describe('delegateEscrow', () => {
    it('the owner delegates the escrow directly and the change is committed', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);

        const { events } = f.registry.delegateEscrow('alice', 'escrow-1', 'dave');

        assert.strictEqual(f.ledger.getVotes('dave'), 500n);
        assert.deepStrictEqual(
            events.map(event => [event.action, event.actor]),
            [['delegated', 'alice']]
        );
        assert.deepStrictEqual(events[0].data, { escrow: 'escrow-1', delegatee: 'dave' });

        expectCode(() => f.registry.withdraw('alice', 1n), 'TokensStillLocked');
        assert.strictEqual(f.ledger.delegates('escrow-1'), 'dave');
        assert.strictEqual(f.ledger.getVotes('dave'), 500n);
    });

    it('refuses anyone but the owner', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        expectCode(() => f.registry.delegateEscrow('bob', 'escrow-1', 'bob'), 'Unauthorized');
        expectCode(() => f.registry.delegateEscrow('staking-registry', 'escrow-1', 'bob'), 'Unauthorized');
        assert.strictEqual(f.ledger.delegates('escrow-1'), null);
    });

    it('needs an existing escrow', () => {
        const f = createFixture();
        expectCode(() => f.registry.delegateEscrow('alice', 'escrow-9', 'dave'), 'NoActiveStaking');
    });
});

describe('setExpiration', () => {
    it('is refused outside dev mode', () => {
        const f = createFixture();
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        expectCode(() => f.registry.setExpiration('alice', 1n, START - 1n), 'Unauthorized');
    });

    it('overrides the lock end in dev mode', () => {
        const f = createFixture({ devMode: true });
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);

        const { events } = f.registry.setExpiration('alice', 1n, START - 1n);

        assert.strictEqual(f.registry.getStake(1n)?.lockEndTime, START - 1n);
        assert.strictEqual(events[0].action, 'staked');
        assert.strictEqual(f.registry.withdraw('alice', 1n).result, 500n);
    });

    it('is owner-only in dev mode', () => {
        const f = createFixture({ devMode: true });
        f.fund('alice', 10000n);
        f.registry.stake('alice', 0);
        expectCode(() => f.registry.setExpiration('bob', 1n, START), 'InvalidStakeId');
    });
});
