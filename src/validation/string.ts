export interface StringRules {
    minLength?: number;
    maxLength?: number;
    // every character must come from this set
    charset?: string;
}

/**
 * Validates names such as accounts and delegatees against length and charset rules.
 */
const validateString = (value: unknown, rules: StringRules = {}): value is string => {
    if (typeof value !== 'string') return false;
    if (value.length < (rules.minLength ?? 0)) return false;
    if (value.length > (rules.maxLength ?? Number.MAX_SAFE_INTEGER)) return false;
    const charset = rules.charset;
    if (charset && [...value].some(char => !charset.includes(char))) return false;
    return true;
};

export default validateString;
