import 'dotenv/config';
import { Server } from 'http';

import { StateCache } from './cache.js';
import { BlockClock, SystemClock, TimeOracle } from './clock.js';
import config from './config.js';
import { StakingError } from './errors.js';
import { CacheTokenLedger } from './ledger.js';
import { StakeLevelTable } from './levels.js';
import logger from './logger.js';
import { disconnectKafkaProducer, initializeKafkaProducer } from './modules/kafka.js';
import { disconnectKafkaConsumer, initializeKafkaConsumer } from './modules/kafkaConsumer.js';
import http from './modules/http/index.js';
import { MongoStateStore } from './mongo.js';
import { ProcessingQueue } from './processingQueue.js';
import { StakeRegistry } from './registry.js';
import settings from './settings.js';
import { StakingTransaction } from './transactions/index.js';
import { publishEvents } from './utils/event-logger.js';
import { CacheVehicleRegistry } from './vehicles.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

const writerQueue = new ProcessingQueue('writer');
const txQueue = new ProcessingQueue('transactions');
let store: MongoStateStore | null = null;
let server: Server | null = null;
let closing = false;

function loadLevels(): StakeLevelTable {
    return settings.stakeLevelsFile ? StakeLevelTable.fromFile(settings.stakeLevelsFile) : StakeLevelTable.fromConfig();
}

/**
 * Applies one ingested transaction on the transaction queue. Rejections are
 * final and already logged by the executor; anything else propagates.
 */
function createSink(registry: StakeRegistry, clock: TimeOracle) {
    return (tx: StakingTransaction): Promise<void> =>
        new Promise((resolve, reject) => {
            txQueue.push(cb => {
                try {
                    if (clock instanceof BlockClock && tx.ts !== undefined) clock.advance(tx.ts);
                    registry.submit(tx);
                    resolve();
                } catch (err) {
                    if (err instanceof StakingError) resolve();
                    else reject(err);
                }
                cb();
            });
        });
}

export async function main(): Promise<void> {
    logger.info(`Starting ${config.networkName} staking node...`);

    const cache = new StateCache();
    store = await MongoStateStore.connect();
    await store.addMongoIndexes();
    await store.loadInto(cache);

    const clock: TimeOracle = settings.timeSource === 'block' ? new BlockClock() : new SystemClock();
    const ledger = new CacheTokenLedger(cache);
    const vehicles = new CacheVehicleRegistry(cache);
    const registry = new StakeRegistry({
        cache,
        ledger,
        vehicles,
        clock,
        levels: loadLevels(),
        mirror: settings.mirrorUpstream
            ? { ledger, vehicles, tokenIssuer: settings.tokenIssuer, vehicleIssuer: settings.vehicleIssuer }
            : undefined,
        devMode: settings.devMode,
    });
    if (!settings.mirrorUpstream) logger.warn('MIRROR_UPSTREAM is off: token and vehicle issuance transactions will be refused.');
    if (settings.devMode) logger.warn('DEV_MODE is on: the lock expiration override is enabled.');

    const activeStore = store;
    registry.onCommit(committed => {
        writerQueue.pushAsync(async () => {
            await cache.writeToDisk(activeStore);
        });
        if (committed.events.length > 0) {
            writerQueue.pushAsync(() => publishEvents(committed.events));
        }
    });

    if (settings.useNotification) await initializeKafkaProducer();
    server = http.init(registry, ledger);
    await initializeKafkaConsumer(createSink(registry, clock));
    logger.info('Node daemon started successfully.');
}

async function shutdown(signal: string): Promise<void> {
    if (closing) return;
    closing = true;
    logger.info(`Received ${signal}, completing writer queue...`);

    const forceExit = setTimeout(() => {
        logger.warn('Forcing shutdown after 30s timeout...');
        process.exit(1);
    }, 30000);

    try {
        await disconnectKafkaConsumer();
        await txQueue.drain();
        await writerQueue.drain();
        await disconnectKafkaProducer();
        if (server) server.close();
        if (store) await store.close();
        clearTimeout(forceExit);
        logger.info('Staking node exited safely');
        process.exit(0);
    } catch (err) {
        logger.error('Error during shutdown:', err);
        process.exit(1);
    }
}

process.on('SIGINT', () => {
    void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});

main().catch(error => {
    logger.fatal('Critical error during node startup:', error);
    process.exit(1);
});

export default main;
