import express, { Request, Response, Router } from 'express';

import type { StakeRegistry } from '../../registry.js';
import { getPagination, paginate, parseIdParam, queryString, sendError, sendJson } from './utils.js';

export function createStakesRouter(registry: StakeRegistry): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /stakes?owner= Stakes of one owner, ordered by id
     * @apiUse PaginationParams
     */
    router.get('/', (req: Request, res: Response) => {
        const owner = queryString(req.query.owner);
        if (!owner) {
            sendJson(res, { success: false, error: 'owner query parameter is required' }, 400);
            return;
        }
        try {
            sendJson(res, { success: true, ...paginate(registry.stakesOf(owner), getPagination(req.query)) });
        } catch (err) {
            sendError(res, err, 'fetching stakes');
        }
    });

    router.get('/:stakeId', (req: Request, res: Response) => {
        const stakeId = parseIdParam(req.params.stakeId);
        if (stakeId === null) {
            sendJson(res, { success: false, error: 'Invalid stake id' }, 400);
            return;
        }
        const stake = registry.getStake(stakeId);
        if (!stake) {
            sendJson(res, { success: false, error: `Stake ${stakeId} not found` }, 404);
            return;
        }
        sendJson(res, { success: true, data: { ...stake, withdrawn: stake.owner === null } });
    });

    return router;
}

export default createStakesRouter;
