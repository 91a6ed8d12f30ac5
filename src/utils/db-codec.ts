import type { CounterState } from '../cache.js';
import type { LedgerAccountData } from '../ledger.js';
import type { AttachmentData, StakeData, StakerEscrowData } from '../transactions/staking/staking-interfaces.js';
import type { VehicleData } from '../vehicles.js';
import { toBigInt, toDbString } from './bigint.js';
import type { EventDocument, StakingEvent } from './event-logger.js';

export type DbRecord = Record<string, unknown>;

/**
 * Maps a cache document to its stored form and back. Amounts, ids and times are
 * stored as zero-padded decimal strings so that string order equals numeric order.
 */
export interface DocumentCodec<T> {
    encode(doc: T): DbRecord;
    decode(raw: DbRecord): T;
}

export class CodecError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CodecError';
    }
}

/**
 * Generic encoder: every bigint becomes a padded string, recursively.
 */
export function encodeValue(value: unknown): unknown {
    if (typeof value === 'bigint') return toDbString(value);
    if (Array.isArray(value)) return value.map(encodeValue);
    if (value !== null && typeof value === 'object') return encodeRecord(value);
    return value;
}

function encodeRecord(value: object): DbRecord {
    const out: DbRecord = {};
    for (const [key, inner] of Object.entries(value)) {
        if (inner === undefined) continue;
        out[key] = encodeValue(inner);
    }
    return out;
}

function isRecord(value: unknown): value is DbRecord {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readString(raw: DbRecord, name: string): string {
    const value = raw[name];
    if (typeof value !== 'string') throw new CodecError(`field '${name}' must be a string`);
    return value;
}

function readNullableString(raw: DbRecord, name: string): string | null {
    const value = raw[name];
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string') throw new CodecError(`field '${name}' must be a string or null`);
    return value;
}

function parseBigInt(value: unknown, name: string): bigint {
    if (typeof value === 'string' && /^[0-9]+$/.test(value)) return toBigInt(value);
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
    throw new CodecError(`field '${name}' must be an unsigned integer string`);
}

function readBigInt(raw: DbRecord, name: string): bigint {
    return parseBigInt(raw[name], name);
}

function readNullableBigInt(raw: DbRecord, name: string): bigint | null {
    const value = raw[name];
    return value === null || value === undefined ? null : parseBigInt(value, name);
}

function readInteger(raw: DbRecord, name: string): number {
    const value = raw[name];
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) throw new CodecError(`field '${name}' must be an integer`);
    return value;
}

function readRecord(raw: DbRecord, name: string): DbRecord {
    const value = raw[name];
    if (!isRecord(value)) throw new CodecError(`field '${name}' must be an object`);
    return value;
}

export const stakeCodec: DocumentCodec<StakeData> = {
    encode: doc => encodeRecord(doc),
    decode: raw => ({
        _id: readString(raw, '_id'),
        level: readInteger(raw, 'level'),
        amount: readBigInt(raw, 'amount'),
        lockEndTime: readBigInt(raw, 'lockEndTime'),
        vehicleId: readBigInt(raw, 'vehicleId'),
        owner: readNullableString(raw, 'owner'),
        escrow: readNullableString(raw, 'escrow'),
    }),
};

export const escrowCodec: DocumentCodec<StakerEscrowData> = {
    encode: doc => encodeRecord(doc),
    decode: raw => ({
        _id: readString(raw, '_id'),
        escrow: readString(raw, 'escrow'),
        createdAt: readBigInt(raw, 'createdAt'),
    }),
};

export const attachmentCodec: DocumentCodec<AttachmentData> = {
    encode: doc => encodeRecord(doc),
    decode: raw => ({
        _id: readString(raw, '_id'),
        stakeId: readBigInt(raw, 'stakeId'),
    }),
};

export const accountCodec: DocumentCodec<LedgerAccountData> = {
    encode: doc => encodeRecord(doc),
    decode: raw => {
        const allowances: Record<string, bigint> = {};
        for (const [spender, value] of Object.entries(readRecord(raw, 'allowances'))) {
            allowances[spender] = parseBigInt(value, `allowances.${spender}`);
        }
        return {
            _id: readString(raw, '_id'),
            balance: readBigInt(raw, 'balance'),
            allowances,
            delegatee: readNullableString(raw, 'delegatee'),
            votes: readBigInt(raw, 'votes'),
        };
    },
};

export const vehicleCodec: DocumentCodec<VehicleData> = {
    encode: doc => encodeRecord(doc),
    decode: raw => ({
        _id: readString(raw, '_id'),
        owner: readString(raw, 'owner'),
    }),
};

export const counterCodec: DocumentCodec<CounterState> = {
    encode: doc => encodeRecord(doc),
    decode: raw => ({
        _id: readString(raw, '_id'),
        nextStakeId: readBigInt(raw, 'nextStakeId'),
        nextEscrowId: readBigInt(raw, 'nextEscrowId'),
        nextEventSeq: readBigInt(raw, 'nextEventSeq'),
    }),
};

function decodeEventBody(action: string, data: DbRecord): StakingEvent {
    switch (action) {
        case 'staked':
            return {
                action: 'staked',
                data: {
                    stakeId: readBigInt(data, 'stakeId'),
                    escrow: readString(data, 'escrow'),
                    level: readInteger(data, 'level'),
                    amount: readBigInt(data, 'amount'),
                    lockEndTime: readBigInt(data, 'lockEndTime'),
                    points: readBigInt(data, 'points'),
                },
            };
        case 'withdrawn':
            return {
                action: 'withdrawn',
                data: { stakeId: readBigInt(data, 'stakeId'), amount: readBigInt(data, 'amount'), points: readBigInt(data, 'points') },
            };
        case 'vehicle_attached':
            return { action: 'vehicle_attached', data: { stakeId: readBigInt(data, 'stakeId'), vehicleId: readBigInt(data, 'vehicleId') } };
        case 'vehicle_detached':
            return { action: 'vehicle_detached', data: { stakeId: readBigInt(data, 'stakeId'), vehicleId: readBigInt(data, 'vehicleId') } };
        case 'extended':
            return { action: 'extended', data: { stakeId: readBigInt(data, 'stakeId'), lockEndTime: readBigInt(data, 'lockEndTime') } };
        case 'upgraded':
            return {
                action: 'upgraded',
                data: {
                    stakeId: readBigInt(data, 'stakeId'),
                    level: readInteger(data, 'level'),
                    amount: readBigInt(data, 'amount'),
                    lockEndTime: readBigInt(data, 'lockEndTime'),
                    points: readBigInt(data, 'points'),
                },
            };
        case 'delegated':
            return { action: 'delegated', data: { escrow: readString(data, 'escrow'), delegatee: readString(data, 'delegatee') } };
        default:
            throw new CodecError(`unknown event action '${action}'`);
    }
}

export const eventCodec: DocumentCodec<EventDocument> = {
    encode: doc => encodeRecord(doc),
    decode: raw => {
        const event: EventDocument = {
            ...decodeEventBody(readString(raw, 'action'), readRecord(raw, 'data')),
            _id: readString(raw, '_id'),
            seq: readBigInt(raw, 'seq'),
            category: readString(raw, 'category'),
            type: readString(raw, 'type'),
            timestamp: readBigInt(raw, 'timestamp'),
            actor: readString(raw, 'actor'),
            stakeId: readNullableBigInt(raw, 'stakeId'),
        };
        const transactionId = readNullableString(raw, 'transactionId');
        if (transactionId !== null) event.transactionId = transactionId;
        return event;
    },
};
