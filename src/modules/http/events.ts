import express, { Request, Response, Router } from 'express';

import type { StakeRegistry } from '../../registry.js';
import type { EventDocument } from '../../utils/event-logger.js';
import { getPagination, paginate, parseIdParam, queryString, sendJson } from './utils.js';

function bySeq(a: EventDocument, b: EventDocument): number {
    return a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0;
}

export function createEventsRouter(registry: StakeRegistry): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /events Staking notifications, oldest first
     * @apiParam {String} [stakeId] History of one stake
     * @apiParam {String} [actor] Notifications about one staker
     * @apiParam {String} [action] e.g. staked, withdrawn, vehicle_attached
     * @apiParam {String} [sortDirection=asc]
     * @apiUse PaginationParams
     */
    router.get('/', (req: Request, res: Response) => {
        const rawStakeId = queryString(req.query.stakeId);
        const stakeId = rawStakeId === null ? null : parseIdParam(rawStakeId);
        if (rawStakeId !== null && stakeId === null) {
            sendJson(res, { success: false, error: 'Invalid stakeId' }, 400);
            return;
        }
        const actor = queryString(req.query.actor);
        const action = queryString(req.query.action);

        let events = stakeId !== null ? registry.eventsForStake(stakeId) : registry.cache.events.find().sort(bySeq);
        if (actor) events = events.filter(event => event.actor === actor);
        if (action) events = events.filter(event => event.action === action);
        if (req.query.sortDirection === 'desc') events.reverse();

        sendJson(res, { success: true, ...paginate(events, getPagination(req.query)) });
    });

    return router;
}

export default createEventsRouter;
