export interface TokenMintData {
    to: string;
    amount: bigint;
}

export interface TokenTransferData {
    to: string;
    amount: bigint;
}

export interface TokenApproveData {
    spender: string;
    amount: bigint; // replaces the previous allowance
}
