import { invalidTransaction, noActiveStaking } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { StakingContext, findEscrow } from './staking-helpers.js';
import { StakeDelegateData } from './staking-interfaces.js';

export function validateTx(data: StakeDelegateData, sender: string, ctx: StakingContext): void {
    if (!validate.account(data.delegatee)) {
        logger.warn(`[stake-delegate:validation] Invalid delegatee ${data.delegatee}`);
        throw invalidTransaction(`invalid delegatee ${data.delegatee}`);
    }
    if (!findEscrow(ctx, sender)) throw noActiveStaking(sender);
}

export function processTx(data: StakeDelegateData, sender: string, ctx: StakingContext): void {
    const escrow = findEscrow(ctx, sender);
    if (!escrow) throw noActiveStaking(sender);
    escrow.delegateVotingPower(ctx.escrowAuthority, data.delegatee);

    logEvent(ctx, sender, { action: 'delegated', data: { escrow: escrow.ref, delegatee: data.delegatee } });
    logger.info(`[stake-delegate] ${sender} delegated ${escrow.ref} voting power to ${data.delegatee}`);
}
