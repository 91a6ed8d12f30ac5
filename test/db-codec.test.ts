import assert from 'assert';
import { describe, it } from 'node:test';

import type { StakeData } from '../src/transactions/staking/staking-interfaces.js';
import { toDbString } from '../src/utils/bigint.js';
import { CodecError, accountCodec, eventCodec, stakeCodec } from '../src/utils/db-codec.js';
import type { EventDocument } from '../src/utils/event-logger.js';

describe('db codecs', () => {
    it('stores stake amounts as padded strings', () => {
        const stake: StakeData = { _id: '3', level: 1, amount: 1500n, lockEndTime: 99n, vehicleId: 0n, owner: 'alice', escrow: 'escrow-1' };
        const stored = stakeCodec.encode(stake);
        assert.strictEqual(stored.amount, toDbString(1500n));
        assert.strictEqual(stored.level, 1);
        assert.strictEqual(stored.owner, 'alice');
        assert.deepStrictEqual(stakeCodec.decode(stored), stake);
    });

    it('keeps tombstones', () => {
        const decoded = stakeCodec.decode({ _id: '4', level: 0, amount: '0', lockEndTime: '10', vehicleId: '0', owner: null, escrow: null });
        assert.strictEqual(decoded.owner, null);
        assert.strictEqual(decoded.amount, 0n);
    });

    it('decodes allowance maps', () => {
        const decoded = accountCodec.decode({
            _id: 'alice',
            balance: '0000100',
            allowances: { 'staking-registry': '25' },
            delegatee: null,
            votes: '0',
        });
        assert.deepStrictEqual(decoded, { _id: 'alice', balance: 100n, allowances: { 'staking-registry': 25n }, delegatee: null, votes: 0n });
    });

    it('restores event documents by action', () => {
        const event: EventDocument = {
            action: 'vehicle_detached',
            data: { stakeId: 1n, vehicleId: 7n },
            _id: 'abc',
            seq: 12n,
            category: 'staking',
            type: 'staking_vehicle_detached',
            timestamp: 1000n,
            actor: 'alice',
            stakeId: 1n,
            transactionId: 'tx-1',
        };
        const stored = eventCodec.encode(event);
        assert.deepStrictEqual(stored.data, { stakeId: toDbString(1n), vehicleId: toDbString(7n) });
        assert.deepStrictEqual(eventCodec.decode(stored), event);
    });

    it('rejects documents with the wrong shape', () => {
        assert.throws(() => stakeCodec.decode({ _id: '1', level: '1' }), CodecError);
        assert.throws(() => eventCodec.decode({ _id: 'x', action: 'exploded', data: {} }), CodecError);
    });
});
