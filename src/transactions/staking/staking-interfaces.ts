// Staking documents and transaction payloads. Numeric fields are bigint in memory
// and zero-padded strings on the wire and in MongoDB.

export interface StakeData {
    _id: string; // decimal stake id
    level: number;
    amount: bigint; // 0 once withdrawn
    lockEndTime: bigint; // seconds
    vehicleId: bigint; // 0 = not attached
    owner: string | null; // null once withdrawn
    escrow: string | null;
}

export interface StakerEscrowData {
    _id: string; // staker account
    escrow: string; // escrow account ref, e.g. escrow-1
    createdAt: bigint;
}

export interface AttachmentData {
    _id: string; // decimal vehicle id
    stakeId: bigint;
}

export interface StakeCreateData {
    level: number;
    vehicleId: bigint;
}

export interface StakeUpgradeData {
    stakeId: bigint;
    level: number;
    vehicleId: bigint;
}

export interface StakeExtendData {
    stakeId: bigint;
}

export interface StakeWithdrawData {
    stakeIds: bigint[];
}

export interface StakeTransferData {
    stakeId: bigint;
    to: string;
}

export interface StakeDelegateData {
    delegatee: string;
}

export interface EscrowDelegateData {
    escrow: string; // escrow ref, e.g. escrow-1
    delegatee: string;
}

export interface StakeSetExpirationData {
    stakeId: bigint;
    lockEndTime: bigint;
}

export interface VehicleAttachData {
    stakeId: bigint;
    vehicleId: bigint;
}

export interface VehicleDetachData {
    vehicleId: bigint;
}
