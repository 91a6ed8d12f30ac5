import assert from 'assert';
import { describe, it } from 'node:test';

import { isStakingError } from '../src/errors.js';
import {
    MAX_UINT256,
    assertUint256,
    checkedAdd,
    checkedSub,
    formatTokenAmount,
    toBigInt,
    toDbString,
} from '../src/utils/bigint.js';

describe('bigint utils', () => {
    it('toBigInt strips padding and maps empty values to zero', () => {
        assert.strictEqual(toBigInt('000123'), 123n);
        assert.strictEqual(toBigInt('0000'), 0n);
        assert.strictEqual(toBigInt(null), 0n);
        assert.strictEqual(toBigInt(undefined), 0n);
        assert.strictEqual(toBigInt(42.9), 42n);
    });

    it('toDbString pads to the uint256 width', () => {
        const padded = toDbString(5n);
        assert.strictEqual(padded.length, 78);
        assert.strictEqual(padded, '0'.repeat(77) + '5');
        assert.strictEqual(toDbString(12n, 4), '0012');
        assert.strictEqual(toDbString(-12n, 4), '-0012');
        assert.throws(() => toDbString(12345n, 4));
    });

    it('padded strings sort like the numbers they hold', () => {
        const values = [1000n, 9n, 250n, MAX_UINT256, 0n];
        const sorted = values.map(v => toDbString(v)).sort();
        assert.deepStrictEqual(sorted.map(toBigInt), [0n, 9n, 250n, 1000n, MAX_UINT256]);
    });

    it('checkedAdd refuses to exceed uint256', () => {
        assert.strictEqual(checkedAdd(MAX_UINT256 - 1n, 1n), MAX_UINT256);
        assert.throws(() => checkedAdd(MAX_UINT256, 1n), (err: unknown) => isStakingError(err, 'NumericOverflow'));
    });

    it('checkedSub refuses to go below zero', () => {
        assert.strictEqual(checkedSub(10n, 10n), 0n);
        assert.throws(() => checkedSub(1n, 2n), (err: unknown) => isStakingError(err, 'NumericOverflow'));
    });

    it('assertUint256 checks both ends of the range', () => {
        assert.strictEqual(assertUint256(0n), 0n);
        assert.strictEqual(assertUint256(MAX_UINT256), MAX_UINT256);
        assert.throws(() => assertUint256(-1n, 'vehicleId'), (err: unknown) => isStakingError(err, 'NumericOverflow'));
        assert.throws(() => assertUint256(MAX_UINT256 + 1n), (err: unknown) => isStakingError(err, 'NumericOverflow'));
    });

    it('formats token amounts with 18 decimals', () => {
        assert.strictEqual(formatTokenAmount(5000n * 10n ** 18n), '5000');
        assert.strictEqual(formatTokenAmount(1500000000000000000n), '1.5');
        assert.strictEqual(formatTokenAmount(1n), '0.000000000000000001');
        assert.strictEqual(formatTokenAmount(123n, 0), '123');
    });
});
