import config from '../config.js';
import { isEscrowRef } from '../utils/deterministic-id.js';
import validateString from './string.js';

/**
 * Validates a user account name. Escrow accounts and the registry account are not users.
 */
const validateAccount = (value: unknown): value is string =>
    validateString(value, { minLength: 1, maxLength: config.accountNameMaxLength, charset: config.allowedAccountChars }) &&
    value !== config.registryAccount &&
    !isEscrowRef(value);

export default validateAccount;
