import fs from 'fs';

import config, { StakeLevelConfig } from './config.js';
import { invalidLevel } from './errors.js';
import logger from './logger.js';
import { assertUint256, toBigInt } from './utils/bigint.js';

export interface StakeLevel {
    amount: bigint;
    lockDuration: bigint; // seconds
    points: bigint;
}

/**
 * Immutable level table. Amounts strictly increase with the level index.
 */
export class StakeLevelTable {
    private readonly levels: readonly StakeLevel[];

    constructor(levels: StakeLevel[]) {
        if (levels.length === 0) throw new Error('Stake level table must not be empty');
        for (let i = 0; i < levels.length; i++) {
            assertUint256(levels[i].amount, 'amount');
            assertUint256(levels[i].lockDuration, 'lockDuration');
            assertUint256(levels[i].points, 'points');
            if (i > 0 && levels[i].amount <= levels[i - 1].amount) {
                throw new Error(`Stake level ${i} amount must be greater than level ${i - 1} amount`);
            }
        }
        this.levels = Object.freeze(levels.map(level => Object.freeze({ ...level })));
    }

    static fromConfig(entries: StakeLevelConfig[] = config.defaultLevels): StakeLevelTable {
        return new StakeLevelTable(
            entries.map(entry => ({
                amount: toBigInt(entry.amount),
                lockDuration: toBigInt(entry.lockDuration),
                points: toBigInt(entry.points),
            }))
        );
    }

    static fromFile(filePath: string): StakeLevelTable {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        if (!Array.isArray(raw)) throw new Error(`Stake level file ${filePath} must hold an array`);
        const entries: StakeLevelConfig[] = raw.map((entry: unknown, i: number) => {
            if (typeof entry !== 'object' || entry === null) throw new Error(`Stake level ${i} in ${filePath} is not an object`);
            return {
                amount: String(Reflect.get(entry, 'amount')),
                lockDuration: String(Reflect.get(entry, 'lockDuration')),
                points: String(Reflect.get(entry, 'points')),
            };
        });
        logger.info(`[levels] Loaded ${entries.length} stake levels from ${filePath}`);
        return StakeLevelTable.fromConfig(entries);
    }

    get maxLevel(): number {
        return this.levels.length - 1;
    }

    isValid(level: number): boolean {
        return Number.isSafeInteger(level) && level >= 0 && level <= this.maxLevel;
    }

    get(level: number): StakeLevel {
        if (!this.isValid(level)) throw invalidLevel(level);
        return this.levels[level];
    }

    all(): readonly StakeLevel[] {
        return this.levels;
    }
}
