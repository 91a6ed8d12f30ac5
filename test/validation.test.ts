import assert from 'assert';
import { describe, it } from 'node:test';

import validate from '../src/validation/index.js';

describe('validation', () => {
    it('checks integers against their rules', () => {
        assert.strictEqual(validate.integer(3), true);
        assert.strictEqual(validate.integer(0), false);
        assert.strictEqual(validate.integer(0, { allowZero: true }), true);
        assert.strictEqual(validate.integer(-1, { allowZero: true }), false);
        assert.strictEqual(validate.integer(-1, { allowNegative: true }), true);
        assert.strictEqual(validate.integer(1.5), false);
        assert.strictEqual(validate.integer('3'), false);
        assert.strictEqual(validate.integer(11, { max: 10 }), false);
        assert.strictEqual(validate.integer(4, { min: 5 }), false);
    });

    it('checks strings against length and charset', () => {
        assert.strictEqual(validate.string('abc', { maxLength: 3 }), true);
        assert.strictEqual(validate.string('abcd', { maxLength: 3 }), false);
        assert.strictEqual(validate.string('', { minLength: 1 }), false);
        assert.strictEqual(validate.string('a-b', { charset: 'ab' }), false);
        assert.strictEqual(validate.string(42), false);
    });

    it('requires a non-empty bounded array', () => {
        assert.strictEqual(validate.array([1, 2], 2), true);
        assert.strictEqual(validate.array([1, 2, 3], 2), false);
        assert.strictEqual(validate.array([]), false);
        assert.strictEqual(validate.array('12'), false);
    });

    it('rejects escrow and registry accounts', () => {
        assert.strictEqual(validate.account('alice'), true);
        assert.strictEqual(validate.account('staking-registry'), false);
        assert.strictEqual(validate.account('escrow-7'), false);
        assert.strictEqual(validate.account('bad name'), false);
        assert.strictEqual(validate.account(''), false);
    });
});
