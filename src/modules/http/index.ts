import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';

import type { TokenLedger } from '../../ledger.js';
import logger from '../../logger.js';
import type { StakeRegistry } from '../../registry.js';
import settings from '../../settings.js';
import { createEscrowsRouter } from './escrows.js';
import { createEventsRouter } from './events.js';
import { createLevelsRouter } from './levels.js';
import { createStakesRouter } from './stakes.js';
import { sendError } from './utils.js';
import { createVehiclesRouter } from './vehicles.js';

/**
 * Read-only query API over the registry.
 */
export function createApp(registry: StakeRegistry, ledger: TokenLedger): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    logger.trace('Setting up HTTP endpoints...');
    app.use('/levels', createLevelsRouter(registry));
    app.use('/stakes', createStakesRouter(registry));
    app.use('/vehicles', createVehiclesRouter(registry));
    app.use('/escrows', createEscrowsRouter(registry, ledger));
    app.use('/events', createEventsRouter(registry));

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        sendError(res, err, 'handling request');
    });
    return app;
}

/**
 * HTTP server module
 */
export function init(registry: StakeRegistry, ledger: TokenLedger, port = settings.apiPort): Server {
    const app = createApp(registry, ledger);
    logger.debug(`Starting HTTP server on port ${port}`);

    const server = app.listen(port, () => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`HTTP server listening on port ${port}`);
        }
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
        } else if (error.code === 'EACCES') {
            logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
        } else {
            logger.error('HTTP server error:', error);
        }
    });
    return server;
}

export default {
    init,
    createApp,
};
