import logger from './logger.js';

/**
 * Source of the current time in seconds. Never goes backwards.
 */
export interface TimeOracle {
    now(): bigint;
}

export class SystemClock implements TimeOracle {
    private last = 0n;

    now(): bigint {
        const wall = BigInt(Math.floor(Date.now() / 1000));
        if (wall > this.last) this.last = wall;
        return this.last;
    }
}

/**
 * Ledger-native clock, advanced by the timestamps of incoming transactions.
 */
export class BlockClock implements TimeOracle {
    constructor(private current: bigint = 0n) {}

    now(): bigint {
        return this.current;
    }

    advance(ts: bigint): void {
        if (ts < this.current) {
            logger.warn(`[clock] Ignoring timestamp ${ts} older than ${this.current}`);
            return;
        }
        this.current = ts;
    }
}
