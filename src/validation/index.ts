import account from './account.js';
import array from './array.js';
import bigint from './bigint.js';
import integer from './integer.js';
import string from './string.js';

/**
 * Type guards shared by transaction decoding and the handlers.
 */
const validate = {
    account,
    array,
    bigint,
    integer,
    string,
};

export default validate;
