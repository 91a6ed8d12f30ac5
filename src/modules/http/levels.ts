import express, { Request, Response, Router } from 'express';

import config from '../../config.js';
import type { StakeRegistry } from '../../registry.js';
import { formatTokenAmount } from '../../utils/bigint.js';
import { sendJson } from './utils.js';

/**
 * @api {get} /levels List the stake level table
 */
export function createLevelsRouter(registry: StakeRegistry): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        const levels = registry.levels().map((level, index) => ({
            level: index,
            amount: level.amount,
            formattedAmount: formatTokenAmount(level.amount, config.stakingTokenPrecision),
            lockDuration: level.lockDuration,
            points: level.points,
        }));
        sendJson(res, { success: true, token: config.stakingTokenSymbol, data: levels });
    });

    return router;
}

export default createLevelsRouter;
