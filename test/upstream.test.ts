import assert from 'assert';
import { describe, it } from 'node:test';

import { isStakingError } from '../src/errors.js';
import { parseTransaction } from '../src/transactions/index.js';
import { REGISTRY, TOKEN_ISSUER, VEHICLE_ISSUER, createFixture, expectCode } from './helpers.js';

function node(mirror = true) {
    const f = createFixture({ mirror });
    const send = (raw: unknown) => f.registry.submit(parseTransaction(raw));
    return { ...f, send };
}

describe('token and vehicle issuance', () => {
    it('funds a staker and a vehicle so a stake can boost it', () => {
        const f = node();
        assert.strictEqual(f.send({ type: 'TOKEN_MINT', sender: TOKEN_ISSUER, data: { to: 'alice', amount: '2000' } }).events.length, 0);
        f.send({ type: 'TOKEN_APPROVE', sender: 'alice', data: { spender: REGISTRY, amount: '500' } });
        f.send({ type: 'VEHICLE_MINT', sender: VEHICLE_ISSUER, data: { vehicleId: '7', to: 'garage' } });

        const staked = f.send({ type: 'STAKE_CREATE', sender: 'alice', data: { level: '0', vehicleId: '7' } });

        assert.strictEqual(staked.result, 1n);
        assert.strictEqual(f.ledger.balanceOf('alice'), 1500n);
        assert.strictEqual(f.ledger.balanceOf('escrow-1'), 500n);
        assert.strictEqual(f.ledger.allowance('alice', REGISTRY), 0n);
        assert.strictEqual(f.registry.attachedStakeOf(7n), 1n);
        assert.strictEqual(f.registry.getBoostPoints(7n), 1000n);
    });

    it('token transfers move mirrored balances', () => {
        const f = node();
        f.send({ type: 'TOKEN_MINT', sender: TOKEN_ISSUER, data: { to: 'alice', amount: '1000' } });
        f.send({ type: 'TOKEN_TRANSFER', sender: 'alice', data: { to: 'bob', amount: '400' } });
        assert.strictEqual(f.ledger.balanceOf('alice'), 600n);
        assert.strictEqual(f.ledger.balanceOf('bob'), 400n);
        expectCode(() => f.send({ type: 'TOKEN_TRANSFER', sender: 'alice', data: { to: 'bob', amount: '700' } }), 'TransferFailed');
        assert.strictEqual(f.ledger.balanceOf('alice'), 600n);
    });

    it('only the issuers mint', () => {
        const f = node();
        expectCode(() => f.send({ type: 'TOKEN_MINT', sender: 'alice', data: { to: 'alice', amount: '1' } }), 'Unauthorized');
        expectCode(() => f.send({ type: 'VEHICLE_MINT', sender: 'alice', data: { vehicleId: '7', to: 'alice' } }), 'Unauthorized');
        f.send({ type: 'VEHICLE_MINT', sender: VEHICLE_ISSUER, data: { vehicleId: '7', to: 'garage' } });
        expectCode(() => f.send({ type: 'VEHICLE_MINT', sender: VEHICLE_ISSUER, data: { vehicleId: '7', to: 'dealer' } }), 'InvalidTransaction');
        assert.strictEqual(f.ledger.balanceOf('alice'), 0n);
        assert.deepStrictEqual(f.vehicles.ownerOf(7n), { ok: true, owner: 'garage' });
    });

    it('vehicles change hands and burn only by their owner', () => {
        const f = node();
        f.send({ type: 'VEHICLE_MINT', sender: VEHICLE_ISSUER, data: { vehicleId: '7', to: 'garage' } });

        expectCode(() => f.send({ type: 'VEHICLE_TRANSFER', sender: 'mallory', data: { vehicleId: '7', to: 'mallory' } }), 'Unauthorized');
        f.send({ type: 'VEHICLE_TRANSFER', sender: 'garage', data: { vehicleId: '7', to: 'dealer' } });
        assert.deepStrictEqual(f.vehicles.ownerOf(7n), { ok: true, owner: 'dealer' });

        expectCode(() => f.send({ type: 'VEHICLE_BURN', sender: 'garage', data: { vehicleId: '7' } }), 'Unauthorized');
        f.send({ type: 'VEHICLE_BURN', sender: 'dealer', data: { vehicleId: '7' } });
        assert.strictEqual(f.vehicles.exists(7n), false);
        expectCode(() => f.send({ type: 'VEHICLE_BURN', sender: 'dealer', data: { vehicleId: '8' } }), 'InvalidExternalId');
    });

    it('a node that does not keep the ledger refuses issuance', () => {
        const f = node(false);
        expectCode(() => f.send({ type: 'TOKEN_MINT', sender: TOKEN_ISSUER, data: { to: 'alice', amount: '1' } }), 'Unauthorized');
        expectCode(() => f.send({ type: 'VEHICLE_MINT', sender: VEHICLE_ISSUER, data: { vehicleId: '7', to: 'garage' } }), 'Unauthorized');
    });

    it('decodes issuance and escrow delegation payloads', () => {
        assert.deepStrictEqual(parseTransaction({ type: 32, sender: 'alice', data: { spender: REGISTRY, amount: '0' } }).data, {
            spender: REGISTRY,
            amount: 0n,
        });
        assert.deepStrictEqual(parseTransaction({ type: 'ESCROW_DELEGATE', sender: 'alice', data: { escrow: 'escrow-1', delegatee: 'carol' } }).data, {
            escrow: 'escrow-1',
            delegatee: 'carol',
        });
        const invalid = (raw: unknown) => assert.throws(() => parseTransaction(raw), (err: unknown) => isStakingError(err, 'InvalidTransaction'));
        invalid({ type: 32, sender: 'alice', data: { spender: 'escrow-1', amount: '5' } });
        invalid({ type: 30, sender: TOKEN_ISSUER, data: { to: 'alice', amount: '0' } });
        invalid({ type: 30, sender: TOKEN_ISSUER, data: { to: 'escrow-1', amount: '5' } });
        invalid({ type: 40, sender: VEHICLE_ISSUER, data: { vehicleId: '0', to: 'garage' } });
        invalid({ type: 21, sender: 'alice', data: { escrow: 'alice', delegatee: 'carol' } });
    });
});
