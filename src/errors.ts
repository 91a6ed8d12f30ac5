export type StakingErrorCode =
    | 'InvalidLevel'
    | 'InvalidStakeId'
    | 'InvalidExternalId'
    | 'AlreadyAttached'
    | 'NoActiveStaking'
    | 'TokensStillLocked'
    | 'Unauthorized'
    | 'TransferFailed'
    | 'InvalidTransaction'
    | 'NumericOverflow';

export class StakingError extends Error {
    code: StakingErrorCode;
    details?: Record<string, unknown>;

    constructor(code: StakingErrorCode, message?: string, details?: Record<string, unknown>) {
        super(message ?? code);
        this.code = code;
        this.details = details;
        this.name = 'StakingError';
    }
}

export function isStakingError(err: unknown, code?: StakingErrorCode): err is StakingError {
    return err instanceof StakingError && (code === undefined || err.code === code);
}

export const invalidLevel = (level: number | bigint) => new StakingError('InvalidLevel', `invalid stake level ${level}`, { level: String(level) });

export const invalidStakeId = (stakeId: bigint) => new StakingError('InvalidStakeId', `invalid stake id ${stakeId}`, { stakeId: stakeId.toString() });

export const invalidExternalId = (vehicleId: bigint) =>
    new StakingError('InvalidExternalId', `unknown vehicle id ${vehicleId}`, { vehicleId: vehicleId.toString() });

export const alreadyAttached = (vehicleId: bigint, stakeId: bigint) =>
    new StakingError('AlreadyAttached', `vehicle ${vehicleId} already attached to stake ${stakeId}`, {
        vehicleId: vehicleId.toString(),
        stakeId: stakeId.toString(),
    });

export const noActiveStaking = (subject: string) => new StakingError('NoActiveStaking', `no active staking for ${subject}`, { subject });

export const tokensStillLocked = (stakeId: bigint, lockEndTime: bigint) =>
    new StakingError('TokensStillLocked', `stake ${stakeId} locked until ${lockEndTime}`, {
        stakeId: stakeId.toString(),
        lockEndTime: lockEndTime.toString(),
    });

export const unauthorized = (caller: string, action: string) => new StakingError('Unauthorized', `${caller} may not ${action}`, { caller, action });

export const transferFailed = (from: string, to: string, amount: bigint) =>
    new StakingError('TransferFailed', `transfer of ${amount} from ${from} to ${to} failed`, { from, to, amount: amount.toString() });

export const invalidTransaction = (reason: string) => new StakingError('InvalidTransaction', reason);
