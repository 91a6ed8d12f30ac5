// Runtime settings sourced from environment variables

export type TimeSource = 'wall' | 'block';

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'boost-staking';

// 'block' makes the clock follow the timestamps carried by incoming transactions
export const timeSource: TimeSource = process.env.TIME_SOURCE === 'block' ? 'block' : 'wall';

// Enables the manual lock-expiration override. Never turn on against real funds.
export const devMode: boolean = process.env.DEV_MODE === 'true';

export const stakeLevelsFile: string = process.env.STAKE_LEVELS_FILE || '';

export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
export const kafkaBrokers: string[] = (process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
export const kafkaTransactionsTopic: string = process.env.KAFKA_TOPIC_TRANSACTIONS || 'staking-transactions';
export const kafkaNotificationsTopic: string = process.env.KAFKA_TOPIC_NOTIFICATIONS || 'staking-notifications';
// Token and vehicle state arrives as issuance transactions on the transactions topic.
export const mirrorUpstream: boolean = process.env.MIRROR_UPSTREAM !== 'false';
export const tokenIssuer: string = process.env.TOKEN_ISSUER || 'token-issuer';
export const vehicleIssuer: string = process.env.VEHICLE_ISSUER || 'vehicle-issuer';

export const kafkaConsumerGroup: string = process.env.KAFKA_CONSUMER_GROUP || 'boost-staking-node';

export default {
    apiPort,
    logLevel,
    mongoUrl,
    mongoDb,
    timeSource,
    devMode,
    stakeLevelsFile,
    useNotification,
    kafkaBrokers,
    kafkaTransactionsTopic,
    kafkaNotificationsTopic,
    kafkaConsumerGroup,
    mirrorUpstream,
    tokenIssuer,
    vehicleIssuer,
};
