import { MAX_UINT256 } from '../utils/bigint.js';

/**
 * Validates a uint256 value given as a bigint or as a decimal string
 * @param value - The value to validate
 * @param allowZero - Whether to allow zero value
 * @param minValue - Optional minimum value
 * @returns boolean indicating if value meets all constraints
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    minValue = 0n
): value is string | bigint {
    let numValue: bigint;
    if (typeof value === 'bigint') {
        numValue = value;
    } else if (typeof value === 'string' && /^[0-9]{1,80}$/.test(value)) {
        numValue = BigInt(value);
    } else {
        return false;
    }

    if (!allowZero && numValue === 0n) return false;
    if (numValue < 0n) return false;
    if (numValue > MAX_UINT256) return false;
    if (numValue < minValue) return false;

    return true;
}
