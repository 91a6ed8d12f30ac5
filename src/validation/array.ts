/**
 * Validates a non-empty batch, such as the stake ids of one withdrawal.
 */
const validateArray = (value: unknown, maxLength = Number.MAX_SAFE_INTEGER): value is unknown[] =>
    Array.isArray(value) && value.length > 0 && value.length <= maxLength;

export default validateArray;
