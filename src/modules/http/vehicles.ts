import express, { Request, Response, Router } from 'express';

import type { StakeRegistry } from '../../registry.js';
import { parseIdParam, sendError, sendJson } from './utils.js';

/**
 * @api {get} /vehicles/:vehicleId Attachment and boost of one vehicle
 */
export function createVehiclesRouter(registry: StakeRegistry): Router {
    const router: Router = express.Router();

    router.get('/:vehicleId', (req: Request, res: Response) => {
        const vehicleId = parseIdParam(req.params.vehicleId);
        if (vehicleId === null) {
            sendJson(res, { success: false, error: 'Invalid vehicle id' }, 400);
            return;
        }
        try {
            sendJson(res, {
                success: true,
                data: {
                    vehicleId,
                    stakeId: registry.attachedStakeOf(vehicleId),
                    boostPoints: registry.getBoostPoints(vehicleId),
                    baselinePoints: registry.getBaselinePoints(vehicleId),
                },
            });
        } catch (err) {
            sendError(res, err, `fetching vehicle ${vehicleId}`);
        }
    });

    return router;
}

export default createVehiclesRouter;
