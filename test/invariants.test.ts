import assert from 'assert';
import { describe, it } from 'node:test';

import { isStakingError } from '../src/errors.js';
import { DAY, START, type Fixture, createFixture } from './helpers.js';

const STAKERS = ['alice', 'bob', 'carol'];
const FUNDING = 20000n;

/**
 * Every escrow holds exactly the sum of its live stakes.
 */
function assertEscrowsBacked(f: Fixture): void {
    const expected = new Map<string, bigint>();
    for (const stake of f.cache.stakes.find()) {
        if (stake.owner === null) {
            assert.strictEqual(stake.amount, 0n);
            assert.strictEqual(stake.escrow, null);
            continue;
        }
        assert.ok(stake.escrow);
        expected.set(stake.escrow, (expected.get(stake.escrow) ?? 0n) + stake.amount);
    }
    for (const link of f.cache.escrows.find()) {
        assert.strictEqual(f.ledger.balanceOf(link.escrow), expected.get(link.escrow) ?? 0n, `escrow ${link.escrow}`);
    }
}

/**
 * Vehicle-to-stake and stake-to-vehicle links agree.
 */
function assertAttachmentsConsistent(f: Fixture): void {
    for (const attachment of f.cache.attachments.find()) {
        const stake = f.registry.getStake(attachment.stakeId);
        assert.ok(stake);
        assert.strictEqual(stake.vehicleId.toString(), attachment._id);
        assert.notStrictEqual(stake.owner, null);
    }
    for (const stake of f.cache.stakes.find()) {
        if (stake.vehicleId === 0n) continue;
        assert.strictEqual(f.registry.attachedStakeOf(stake.vehicleId), BigInt(stake._id));
    }
}

function totalSupply(f: Fixture): bigint {
    return f.cache.accounts.find().reduce((sum, account) => sum + account.balance, 0n);
}

function attempt(fn: () => unknown): boolean {
    try {
        fn();
        return true;
    } catch (err) {
        if (!isStakingError(err)) throw err;
        return false;
    }
}

describe('registry invariants', () => {
    it('hold across a mixed sequence of successful and rejected operations', () => {
        const f = createFixture();
        for (const staker of STAKERS) f.fund(staker, FUNDING);
        f.mintVehicle(1n, 'garage');
        f.mintVehicle(2n, 'garage');
        const supply = totalSupply(f);

        const steps: Array<() => unknown> = [
            () => f.registry.stake('alice', 0, 1n),
            () => f.registry.stake('bob', 1, 1n),
            () => f.registry.stake('bob', 1, 2n),
            () => f.registry.stake('carol', 2),
            () => f.registry.upgradeStake('alice', 1n, 2),
            () => f.registry.withdraw('bob', 2n),
            () => f.registry.transfer('carol', 'alice', 3n),
            () => f.registry.attachVehicle('alice', 3n, 2n),
            () => f.clock.advance(START + 800n * DAY),
            () => f.registry.attachVehicle('alice', 3n, 2n),
            () => f.registry.withdraw('alice', [1n, 3n]),
            () => f.registry.stake('bob', 0, 1n),
            () => f.registry.withdraw('bob', [2n, 2n]),
            () => f.registry.delegate('alice', 'bob'),
        ];

        const outcomes: boolean[] = [];
        for (const step of steps) {
            outcomes.push(attempt(step));
            assertEscrowsBacked(f);
            assertAttachmentsConsistent(f);
            assert.strictEqual(totalSupply(f), supply);
        }

        assert.deepStrictEqual(outcomes, [
            true, // alice stakes with vehicle 1
            false, // vehicle 1 is held by a live stake
            true, // bob takes vehicle 2
            true,
            true, // alice upgrades to level 2 and drops vehicle 1
            false, // bob's stake is still locked
            true, // carol hands stake 3 to alice
            false, // vehicle 2 is held by bob's live stake
            true,
            true, // bob's stake has expired by now
            true,
            true, // vehicle 1 is free again
            false, // repeated id
            true,
        ]);

        assert.strictEqual(f.ledger.balanceOf('alice'), FUNDING + 4000n);
        assert.strictEqual(f.ledger.balanceOf('carol'), FUNDING - 4000n);
        assert.strictEqual(f.registry.attachedStakeOf(1n), 4n);
        assert.strictEqual(f.registry.attachedStakeOf(2n), null);
    });
});
