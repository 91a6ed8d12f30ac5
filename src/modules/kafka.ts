import { Kafka, Producer, logLevel } from 'kafkajs';

import logger from '../logger.js';
import settings from '../settings.js';
import { deterministicIdFrom } from '../utils/deterministic-id.js';

const KAFKA_CLIENT_ID = process.env.KAFKA_CLIENT_ID || `boost-staking-producer-${deterministicIdFrom([process.env.NODE_ID || process.pid], 8)}`;

let kafka: Kafka | null = null;
let producer: Producer | null = null;
let initializing: Promise<void> | null = null;
let isConnected = false;

async function connectProducer(): Promise<void> {
    try {
        kafka = new Kafka({
            clientId: KAFKA_CLIENT_ID,
            brokers: settings.kafkaBrokers,
            logLevel: logLevel.WARN,
            retry: {
                initialRetryTime: 300,
                retries: 5,
            },
        });

        const newProducer = kafka.producer({ allowAutoTopicCreation: true });
        await newProducer.connect();
        producer = newProducer;
        isConnected = true;
        logger.info(`[kafka-producer] Connected to Kafka brokers: ${settings.kafkaBrokers.join(',')}`);

        producer.on('producer.disconnect', () => {
            logger.warn('[kafka-producer] Kafka producer disconnected.');
            isConnected = false;
        });
    } catch (error) {
        isConnected = false;
        producer = null;
        const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
        logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
    }
}

/**
 * Initializes the Kafka client and producer once. Concurrent callers share the same attempt.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    if (!initializing) {
        initializing = connectProducer().finally(() => {
            initializing = null;
        });
    } else {
        logger.info('[kafka-producer] Kafka producer initialization already in progress; awaiting existing init.');
    }
    await initializing;
}

/**
 * Sends a serialized message to a Kafka topic.
 */
export async function sendKafkaEvent(topic: string, value: string, key?: string): Promise<void> {
    if (!producer || !isConnected) {
        logger.warn('[kafka-producer] Kafka producer not initialized or not connected. Attempting to initialize...');
        await initializeKafkaProducer();
    }
    if (!producer || !isConnected) {
        throw new Error(`[kafka-producer] Producer unavailable. Topic: ${topic}`);
    }

    logger.debug(`[kafka-producer] Sending event to Kafka topic '${topic}'. Key: '${key || 'none'}', Message: ${value}`);
    await producer.send({
        topic,
        messages: [{ key, value }],
    });
}

/**
 * Disconnects the Kafka producer. Call this on application shutdown.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (producer && isConnected) {
        try {
            await producer.disconnect();
            logger.info('[kafka-producer] Kafka producer disconnected successfully.');
        } catch (error) {
            logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
        } finally {
            producer = null;
            isConnected = false;
        }
    } else {
        logger.info('[kafka-producer] Kafka producer was not connected or already disconnected.');
    }
}

