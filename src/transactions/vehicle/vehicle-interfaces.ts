export interface VehicleMintData {
    vehicleId: bigint;
    to: string;
}

export interface VehicleTransferData {
    vehicleId: bigint;
    to: string;
}

export interface VehicleBurnData {
    vehicleId: bigint;
}
