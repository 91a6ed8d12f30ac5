import crypto from 'crypto';

import config from '../config.js';

/**
 * Generate a deterministic id from arbitrary stringifiable parts.
 * Returns a hex string of length `len` (default 16).
 */
export function deterministicIdFrom(parts: Array<string | number | bigint>, len = 16): string {
    const joined = parts.map(p => String(p)).join('|');
    const hash = crypto.createHash('sha256').update(joined).digest('hex');
    return hash.substring(0, len);
}

// Cache and database keys. Numeric ids are stored by their decimal form.

export const stakeKey = (stakeId: bigint): string => stakeId.toString();

export const vehicleKey = (vehicleId: bigint): string => vehicleId.toString();

export const escrowRef = (seq: bigint): string => `${config.escrowPrefix}${seq}`;

export function isEscrowRef(account: string): boolean {
    return account.startsWith(config.escrowPrefix) && /^[1-9][0-9]*$/.test(account.slice(config.escrowPrefix.length));
}
