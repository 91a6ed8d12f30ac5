import { ledgerTransfer } from '../../escrow.js';
import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { TokenTransferData } from './token-interfaces.js';

export function validateTx(_data: TokenTransferData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender);
}

export function processTx(data: TokenTransferData, sender: string, ctx: StakingContext): void {
    const { ledger } = requireMirror(ctx, sender);
    ledgerTransfer(sender, data.to, data.amount, () => ledger.transfer(sender, data.to, data.amount));
    logger.debug(`[token-transfer] ${sender} sent ${data.amount} to ${data.to}`);
}
