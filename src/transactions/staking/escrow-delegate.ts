import { invalidTransaction, noActiveStaking } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { StakingContext, findEscrowByRef } from './staking-helpers.js';
import { EscrowDelegateData } from './staking-interfaces.js';

export function validateTx(data: EscrowDelegateData, _sender: string, ctx: StakingContext): void {
    if (!validate.account(data.delegatee)) {
        logger.warn(`[escrow-delegate:validation] Invalid delegatee ${data.delegatee}`);
        throw invalidTransaction(`invalid delegatee ${data.delegatee}`);
    }
    if (!findEscrowByRef(ctx, data.escrow)) throw noActiveStaking(data.escrow);
}

/**
 * The escrow owner redirects its voting power directly; the escrow refuses anyone else.
 */
export function processTx(data: EscrowDelegateData, sender: string, ctx: StakingContext): void {
    const escrow = findEscrowByRef(ctx, data.escrow);
    if (!escrow) throw noActiveStaking(data.escrow);
    escrow.delegateVotingPower(sender, data.delegatee);

    logEvent(ctx, sender, { action: 'delegated', data: { escrow: escrow.ref, delegatee: data.delegatee } });
    logger.info(`[escrow-delegate] ${sender} delegated ${escrow.ref} voting power to ${data.delegatee}`);
}
