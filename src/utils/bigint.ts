import config from '../config.js';
import { StakingError } from '../errors.js';

export const MAX_UINT256: bigint = BigInt(config.maxValue);

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to a zero-padded string suitable for database storage.
 * Padding to the full uint256 width keeps lexicographic order equal to numeric order in MongoDB.
 */
export function toDbString(value: number | string | bigint, padLength = config.dbPadLength): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

export function assertUint256(value: bigint, label = 'value'): bigint {
    if (value < 0n || value > MAX_UINT256) {
        throw new StakingError('NumericOverflow', `${label} out of uint256 range`, { [label]: value.toString() });
    }
    return value;
}

/**
 * Addition that fails instead of exceeding the uint256 range.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
    const sum = a + b;
    if (sum > MAX_UINT256) {
        throw new StakingError('NumericOverflow', 'addition overflow', { a: a.toString(), b: b.toString() });
    }
    return sum;
}

/**
 * Subtraction that fails instead of going below zero.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
    if (b > a) {
        throw new StakingError('NumericOverflow', 'subtraction underflow', { a: a.toString(), b: b.toString() });
    }
    return a - b;
}

/**
 * Format a token amount with proper decimal places
 */
export function formatTokenAmount(value: bigint, decimals: number = config.stakingTokenPrecision): string {
    if (decimals === 0) return value.toString();
    const str = value.toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals) || '0';
    const decimalPart = str.slice(-decimals);

    // Trim trailing zeros for better readability
    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    return trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
}
