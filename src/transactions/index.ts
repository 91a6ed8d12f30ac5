import { invalidTransaction } from '../errors.js';
import logger from '../logger.js';
import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';
import { isEscrowRef } from '../utils/deterministic-id.js';
import validate from '../validation/index.js';
import * as escrowDelegate from './staking/escrow-delegate.js';
import * as stakeCreate from './staking/stake-create.js';
import * as stakeDelegate from './staking/stake-delegate.js';
import * as stakeExtend from './staking/stake-extend.js';
import * as stakeSetExpiration from './staking/stake-set-expiration.js';
import * as stakeTransfer from './staking/stake-transfer.js';
import * as stakeUpgrade from './staking/stake-upgrade.js';
import * as stakeWithdraw from './staking/stake-withdraw.js';
import * as vehicleAttach from './staking/vehicle-attach.js';
import * as vehicleDetach from './staking/vehicle-detach.js';
import type { StakingContext } from './staking/staking-helpers.js';
import * as tokenApprove from './token/token-approve.js';
import * as tokenMint from './token/token-mint.js';
import * as tokenTransfer from './token/token-transfer.js';
import * as vehicleBurn from './vehicle/vehicle-burn.js';
import * as vehicleMint from './vehicle/vehicle-mint.js';
import * as vehicleTransfer from './vehicle/vehicle-transfer.js';
import {
    EscrowDelegateData,
    StakeCreateData,
    StakeDelegateData,
    StakeExtendData,
    StakeSetExpirationData,
    StakeTransferData,
    StakeUpgradeData,
    StakeWithdrawData,
    VehicleAttachData,
    VehicleDetachData,
} from './staking/staking-interfaces.js';
import { TokenApproveData, TokenMintData, TokenTransferData } from './token/token-interfaces.js';
import { TransactionType } from './types.js';
import { VehicleBurnData, VehicleMintData, VehicleTransferData } from './vehicle/vehicle-interfaces.js';

export interface Transaction<T> {
    type: TransactionType;
    sender: string;
    data: T;
    ts?: bigint; // seconds; advances a ledger-native clock
    hash?: string;
}

/**
 * A staking handler: `validateTx` throws on a rejected transaction and changes nothing,
 * `processTx` applies it and may still throw, in which case the executor rolls back.
 */
export interface TransactionHandler<T, R = void> {
    validateTx: (data: T, sender: string, ctx: StakingContext) => void;
    processTx: (data: T, sender: string, ctx: StakingContext) => R;
}

type Tx<K extends TransactionType, T> = Transaction<T> & { type: K };

export type StakingTransaction =
    | Tx<TransactionType.STAKE_CREATE, StakeCreateData>
    | Tx<TransactionType.STAKE_UPGRADE, StakeUpgradeData>
    | Tx<TransactionType.STAKE_EXTEND, StakeExtendData>
    | Tx<TransactionType.STAKE_WITHDRAW, StakeWithdrawData>
    | Tx<TransactionType.STAKE_TRANSFER, StakeTransferData>
    | Tx<TransactionType.STAKE_DELEGATE, StakeDelegateData>
    | Tx<TransactionType.STAKE_SET_EXPIRATION, StakeSetExpirationData>
    | Tx<TransactionType.VEHICLE_ATTACH, VehicleAttachData>
    | Tx<TransactionType.VEHICLE_DETACH, VehicleDetachData>
    | Tx<TransactionType.ESCROW_DELEGATE, EscrowDelegateData>
    | Tx<TransactionType.TOKEN_MINT, TokenMintData>
    | Tx<TransactionType.TOKEN_TRANSFER, TokenTransferData>
    | Tx<TransactionType.TOKEN_APPROVE, TokenApproveData>
    | Tx<TransactionType.VEHICLE_MINT, VehicleMintData>
    | Tx<TransactionType.VEHICLE_TRANSFER, VehicleTransferData>
    | Tx<TransactionType.VEHICLE_BURN, VehicleBurnData>;

export const transactionHandlers = {
    [TransactionType.STAKE_CREATE]: stakeCreate,
    [TransactionType.STAKE_UPGRADE]: stakeUpgrade,
    [TransactionType.STAKE_EXTEND]: stakeExtend,
    [TransactionType.STAKE_WITHDRAW]: stakeWithdraw,
    [TransactionType.STAKE_TRANSFER]: stakeTransfer,
    [TransactionType.STAKE_DELEGATE]: stakeDelegate,
    [TransactionType.STAKE_SET_EXPIRATION]: stakeSetExpiration,
    [TransactionType.VEHICLE_ATTACH]: vehicleAttach,
    [TransactionType.VEHICLE_DETACH]: vehicleDetach,
    [TransactionType.ESCROW_DELEGATE]: escrowDelegate,
    [TransactionType.TOKEN_MINT]: tokenMint,
    [TransactionType.TOKEN_TRANSFER]: tokenTransfer,
    [TransactionType.TOKEN_APPROVE]: tokenApprove,
    [TransactionType.VEHICLE_MINT]: vehicleMint,
    [TransactionType.VEHICLE_TRANSFER]: vehicleTransfer,
    [TransactionType.VEHICLE_BURN]: vehicleBurn,
} satisfies Record<TransactionType, TransactionHandler<never, unknown>>;

function field(data: object, name: string): unknown {
    return Reflect.get(data, name);
}

/**
 * Unsigned id or amount given as a decimal string or a safe integer.
 */
function decodeUint(value: unknown, name: string, allowZero: boolean): bigint {
    if (typeof value === 'number') {
        if (validate.integer(value, { allowZero })) return BigInt(value);
    } else if (validate.bigint(value, allowZero)) {
        return toBigInt(value);
    }
    throw invalidTransaction(`invalid ${name}`);
}

// Range is checked by the handler so that an unknown level reports InvalidLevel.
function decodeLevel(value: unknown): number {
    if (validate.integer(value, { allowZero: true, allowNegative: true })) return value;
    if (typeof value === 'string' && /^-?[0-9]{1,15}$/.test(value)) return Number(value);
    throw invalidTransaction('invalid level');
}

function decodeAccount(value: unknown, name: string): string {
    if (!validate.account(value)) throw invalidTransaction(`invalid ${name}`);
    return value;
}

// Spenders may be the registry account, never an escrow.
function decodeSpender(value: unknown): string {
    if (
        !validate.string(value, { minLength: 1, maxLength: config.accountNameMaxLength, charset: config.allowedAccountChars }) ||
        isEscrowRef(value)
    ) {
        throw invalidTransaction('invalid spender');
    }
    return value;
}

function decodeEscrowRef(value: unknown): string {
    if (typeof value !== 'string' || !isEscrowRef(value)) throw invalidTransaction('invalid escrow');
    return value;
}

function decodeType(value: unknown): TransactionType {
    for (const known of Object.values(TransactionType)) {
        if (typeof known !== 'number') continue;
        if (known === value || TransactionType[known] === value) return known;
    }
    throw invalidTransaction(`unknown transaction type ${String(value)}`);
}

/**
 * Decodes a JSON transaction `{type, sender, data, ts?}` into a typed staking transaction.
 * Integers travel as decimal strings; `type` is the numeric id or the enum name.
 */
export function parseTransaction(raw: unknown): StakingTransaction {
    if (typeof raw !== 'object' || raw === null) throw invalidTransaction('transaction must be an object');
    const type = decodeType(field(raw, 'type'));
    const sender = decodeAccount(field(raw, 'sender'), 'sender');
    const data = field(raw, 'data');
    if (typeof data !== 'object' || data === null) throw invalidTransaction('invalid transaction data');
    const rawTs = field(raw, 'ts');
    const ts = rawTs === undefined ? undefined : decodeUint(rawTs, 'ts', true);

    logger.trace(`[transactions] Decoding ${TransactionType[type]} from ${sender}`);
    switch (type) {
        case TransactionType.STAKE_CREATE:
            return {
                type,
                sender,
                ts,
                data: { level: decodeLevel(field(data, 'level')), vehicleId: decodeUint(field(data, 'vehicleId') ?? '0', 'vehicleId', true) },
            };
        case TransactionType.STAKE_UPGRADE:
            return {
                type,
                sender,
                ts,
                data: {
                    stakeId: decodeUint(field(data, 'stakeId'), 'stakeId', false),
                    level: decodeLevel(field(data, 'level')),
                    vehicleId: decodeUint(field(data, 'vehicleId') ?? '0', 'vehicleId', true),
                },
            };
        case TransactionType.STAKE_EXTEND:
            return { type, sender, ts, data: { stakeId: decodeUint(field(data, 'stakeId'), 'stakeId', false) } };
        case TransactionType.STAKE_WITHDRAW: {
            const single = field(data, 'stakeId');
            const list = single === undefined ? field(data, 'stakeIds') : [single];
            if (!validate.array(list, config.maxBatchWithdraw)) throw invalidTransaction('invalid stakeIds');
            return { type, sender, ts, data: { stakeIds: list.map(id => decodeUint(id, 'stakeId', false)) } };
        }
        case TransactionType.STAKE_TRANSFER:
            return {
                type,
                sender,
                ts,
                data: { stakeId: decodeUint(field(data, 'stakeId'), 'stakeId', false), to: decodeAccount(field(data, 'to'), 'to') },
            };
        case TransactionType.STAKE_DELEGATE:
            return { type, sender, ts, data: { delegatee: decodeAccount(field(data, 'delegatee'), 'delegatee') } };
        case TransactionType.STAKE_SET_EXPIRATION:
            return {
                type,
                sender,
                ts,
                data: {
                    stakeId: decodeUint(field(data, 'stakeId'), 'stakeId', false),
                    lockEndTime: decodeUint(field(data, 'lockEndTime'), 'lockEndTime', true),
                },
            };
        case TransactionType.VEHICLE_ATTACH:
            return {
                type,
                sender,
                ts,
                data: {
                    stakeId: decodeUint(field(data, 'stakeId'), 'stakeId', false),
                    vehicleId: decodeUint(field(data, 'vehicleId'), 'vehicleId', true),
                },
            };
        case TransactionType.VEHICLE_DETACH:
            return { type, sender, ts, data: { vehicleId: decodeUint(field(data, 'vehicleId'), 'vehicleId', true) } };
        case TransactionType.ESCROW_DELEGATE:
            return {
                type,
                sender,
                ts,
                data: { escrow: decodeEscrowRef(field(data, 'escrow')), delegatee: decodeAccount(field(data, 'delegatee'), 'delegatee') },
            };
        case TransactionType.TOKEN_MINT:
            return { type, sender, ts, data: { to: decodeAccount(field(data, 'to'), 'to'), amount: decodeUint(field(data, 'amount'), 'amount', false) } };
        case TransactionType.TOKEN_TRANSFER:
            return { type, sender, ts, data: { to: decodeAccount(field(data, 'to'), 'to'), amount: decodeUint(field(data, 'amount'), 'amount', false) } };
        case TransactionType.TOKEN_APPROVE:
            return {
                type,
                sender,
                ts,
                data: { spender: decodeSpender(field(data, 'spender')), amount: decodeUint(field(data, 'amount'), 'amount', true) },
            };
        case TransactionType.VEHICLE_MINT:
            return {
                type,
                sender,
                ts,
                data: { vehicleId: decodeUint(field(data, 'vehicleId'), 'vehicleId', false), to: decodeAccount(field(data, 'to'), 'to') },
            };
        case TransactionType.VEHICLE_TRANSFER:
            return {
                type,
                sender,
                ts,
                data: { vehicleId: decodeUint(field(data, 'vehicleId'), 'vehicleId', false), to: decodeAccount(field(data, 'to'), 'to') },
            };
        case TransactionType.VEHICLE_BURN:
            return { type, sender, ts, data: { vehicleId: decodeUint(field(data, 'vehicleId'), 'vehicleId', false) } };
    }
}
