export interface IntegerRules {
    allowZero?: boolean;
    allowNegative?: boolean;
    min?: number;
    max?: number;
}

/**
 * Validates a JSON number that must be a safe integer, e.g. a stake level or a small id.
 * Without rules it accepts strictly positive integers.
 */
const validateInteger = (value: unknown, rules: IntegerRules = {}): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) return false;
    if (value === 0 && !rules.allowZero) return false;
    if (value < 0 && !rules.allowNegative) return false;
    if (rules.min !== undefined && value < rules.min) return false;
    if (rules.max !== undefined && value > rules.max) return false;
    return true;
};

export default validateInteger;
