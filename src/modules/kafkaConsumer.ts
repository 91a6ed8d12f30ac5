import { Consumer, Kafka, logLevel } from 'kafkajs';

import { StakingError } from '../errors.js';
import logger from '../logger.js';
import settings from '../settings.js';
import { StakingTransaction, parseTransaction } from '../transactions/index.js';
import { deterministicIdFrom } from '../utils/deterministic-id.js';

const KAFKA_CLIENT_ID = process.env.KAFKA_CONSUMER_CLIENT_ID || `boost-staking-consumer-${deterministicIdFrom([process.env.NODE_ID || process.pid], 8)}`;

let consumer: Consumer | null = null;

/**
 * Receives each decoded transaction; resolves once it has been applied.
 */
export type TransactionSink = (tx: StakingTransaction) => Promise<void>;

/**
 * Decodes one message of the transactions topic. Returns null for messages that are not staking transactions.
 */
export function decodeTransactionMessage(value: Buffer | null): StakingTransaction | null {
    if (!value) return null;
    let raw: unknown;
    try {
        raw = JSON.parse(value.toString());
    } catch (err) {
        logger.warn(`[kafka-consumer] Dropping non-JSON message: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }
    try {
        return parseTransaction(raw);
    } catch (err) {
        if (!(err instanceof StakingError)) throw err;
        logger.warn(`[kafka-consumer] Dropping invalid transaction: ${err.message}`);
        return null;
    }
}

export async function initializeKafkaConsumer(sink: TransactionSink): Promise<void> {
    if (consumer) {
        logger.info('[kafka-consumer] Kafka consumer already initialized.');
        return;
    }

    const kafka = new Kafka({
        clientId: KAFKA_CLIENT_ID,
        brokers: settings.kafkaBrokers,
        logLevel: logLevel.WARN,
    });

    const newConsumer = kafka.consumer({
        groupId: settings.kafkaConsumerGroup,
        sessionTimeout: Number(process.env.KAFKA_CONSUMER_SESSION_TIMEOUT) || 60000,
    });
    await newConsumer.connect();
    consumer = newConsumer;
    logger.info(`[kafka-consumer] Connected to Kafka brokers: ${settings.kafkaBrokers.join(',')}`);

    consumer.on(consumer.events.CRASH, event => {
        logger.error('[kafka-consumer] CRASH event', event.payload.error);
    });

    await consumer.subscribe({ topic: settings.kafkaTransactionsTopic, fromBeginning: true });
    logger.info(`[kafka-consumer] Subscribed to topic '${settings.kafkaTransactionsTopic}'`);

    await consumer.run({
        eachMessage: async ({ topic, partition, message }) => {
            const tx = decodeTransactionMessage(message.value);
            if (!tx) return;
            logger.debug(`[kafka-consumer] Applying transaction from ${topic}[${partition}]@${message.offset}`);
            await sink(tx);
        },
    });
}

export async function disconnectKafkaConsumer(): Promise<void> {
    if (consumer) {
        try {
            await consumer.disconnect();
            logger.info('[kafka-consumer] Kafka consumer disconnected.');
        } catch (err) {
            logger.error('[kafka-consumer] Error disconnecting Kafka consumer:', err);
        } finally {
            consumer = null;
        }
    } else {
        logger.info('[kafka-consumer] No Kafka consumer to disconnect.');
    }
}

export default {
    initializeKafkaConsumer,
    disconnectKafkaConsumer,
    decodeTransactionMessage,
};
