import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { TokenApproveData } from './token-interfaces.js';

export function validateTx(_data: TokenApproveData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender);
}

export function processTx(data: TokenApproveData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender).ledger.approve(sender, data.spender, data.amount);
    logger.debug(`[token-approve] ${sender} allows ${data.spender} to spend ${data.amount}`);
}
