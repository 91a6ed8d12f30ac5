import express, { Request, Response, Router } from 'express';

import type { TokenLedger } from '../../ledger.js';
import type { StakeRegistry } from '../../registry.js';
import { sendError, sendJson } from './utils.js';

/**
 * @api {get} /escrows/:owner Escrow of one staker
 */
export function createEscrowsRouter(registry: StakeRegistry, ledger: TokenLedger): Router {
    const router: Router = express.Router();

    router.get('/:owner', (req: Request, res: Response) => {
        const owner = req.params.owner;
        try {
            const escrow = registry.escrowOf(owner);
            if (!escrow) {
                sendJson(res, { success: false, error: `No escrow for ${owner}` }, 404);
                return;
            }
            sendJson(res, {
                success: true,
                data: {
                    owner,
                    escrow: escrow.ref,
                    balance: escrow.balance,
                    delegatee: escrow.delegatee,
                    delegateeVotes: escrow.delegatee ? ledger.getVotes(escrow.delegatee) : 0n,
                },
            });
        } catch (err) {
            sendError(res, err, `fetching escrow of ${owner}`);
        }
    });

    return router;
}

export default createEscrowsRouter;
