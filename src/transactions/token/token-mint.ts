import { unauthorized } from '../../errors.js';
import logger from '../../logger.js';
import { requireMirror } from '../mirror.js';
import type { StakingContext } from '../staking/staking-helpers.js';
import { TokenMintData } from './token-interfaces.js';

export function validateTx(data: TokenMintData, sender: string, ctx: StakingContext): void {
    const mirror = requireMirror(ctx, sender);
    if (sender !== mirror.tokenIssuer) {
        logger.warn(`[token-mint:validation] ${sender} is not the token issuer`);
        throw unauthorized(sender, 'mint tokens');
    }
}

export function processTx(data: TokenMintData, sender: string, ctx: StakingContext): void {
    requireMirror(ctx, sender).ledger.mint(data.to, data.amount);
    logger.info(`[token-mint] ${sender} minted ${data.amount} to ${data.to}`);
}
