export enum TransactionType {
  // Stake lifecycle
  STAKE_CREATE = 1,
  STAKE_UPGRADE = 2,
  STAKE_EXTEND = 3,
  STAKE_WITHDRAW = 4,
  STAKE_TRANSFER = 5,

  // Vehicle attachment
  VEHICLE_ATTACH = 10,
  VEHICLE_DETACH = 11,

  // Escrow voting power
  STAKE_DELEGATE = 20,
  ESCROW_DELEGATE = 21,

  // Upstream token ledger
  TOKEN_MINT = 30,
  TOKEN_TRANSFER = 31,
  TOKEN_APPROVE = 32,

  // Upstream vehicle registry
  VEHICLE_MINT = 40,
  VEHICLE_TRANSFER = 41,
  VEHICLE_BURN = 42,

  // Development nodes only
  STAKE_SET_EXPIRATION = 90
}
