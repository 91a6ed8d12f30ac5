import type { StateCache } from '../cache.js';
import config from '../config.js';
import logger from '../logger.js';
import { sendKafkaEvent } from '../modules/kafka.js';
import settings from '../settings.js';
import { deterministicIdFrom } from './deterministic-id.js';

export interface StakedEventData {
    stakeId: bigint;
    escrow: string;
    level: number;
    amount: bigint;
    lockEndTime: bigint;
    points: bigint;
}

export interface WithdrawnEventData {
    stakeId: bigint;
    amount: bigint;
    points: bigint;
}

export interface VehicleEventData {
    stakeId: bigint;
    vehicleId: bigint;
}

export interface ExtendedEventData {
    stakeId: bigint;
    lockEndTime: bigint;
}

export interface UpgradedEventData {
    stakeId: bigint;
    level: number;
    amount: bigint; // total staked after the upgrade
    lockEndTime: bigint;
    points: bigint;
}

export interface DelegatedEventData {
    escrow: string;
    delegatee: string;
}

export type StakingEvent =
    | { action: 'staked'; data: StakedEventData }
    | { action: 'withdrawn'; data: WithdrawnEventData }
    | { action: 'vehicle_attached'; data: VehicleEventData }
    | { action: 'vehicle_detached'; data: VehicleEventData }
    | { action: 'extended'; data: ExtendedEventData }
    | { action: 'upgraded'; data: UpgradedEventData }
    | { action: 'delegated'; data: DelegatedEventData };

export type StakingEventAction = StakingEvent['action'];

/**
 * Represents the structure of an event document to be stored.
 */
export type EventDocument = StakingEvent & {
    _id: string;
    seq: bigint;
    category: string;
    type: string; // category_action
    timestamp: bigint; // seconds, from the time oracle
    actor: string; // the staker the notification is about
    stakeId: bigint | null;
    transactionId?: string;
};

export interface EventContext {
    cache: StateCache;
    now: bigint;
    transactionId?: string;
}

function stakeIdOf(event: StakingEvent): bigint | null {
    return event.action === 'delegated' ? null : event.data.stakeId;
}

/**
 * Records a staking notification in the events collection of the running transaction.
 * The event is only kept, and published, if the transaction commits.
 */
export function logEvent(ctx: EventContext, actor: string, event: StakingEvent): EventDocument {
    const seq = ctx.cache.nextId('nextEventSeq');
    const eventDocument: EventDocument = {
        ...event,
        _id: deterministicIdFrom([config.eventCategory, event.action, actor, ctx.transactionId ?? '', seq], 24),
        seq,
        category: config.eventCategory,
        type: `${config.eventCategory}_${event.action}`,
        timestamp: ctx.now,
        actor,
        stakeId: stakeIdOf(event),
    };
    if (ctx.transactionId) eventDocument.transactionId = ctx.transactionId;

    if (!ctx.cache.events.insertOne(eventDocument._id, eventDocument)) {
        throw new Error(`[event-logger] Duplicate event id ${eventDocument._id}`);
    }
    logger.debug(`[event-logger] Event logged to cache: Action: ${event.action}, Actor: ${actor}, EventID: ${eventDocument._id}`);
    return eventDocument;
}

export function serializeEvent(event: EventDocument): string {
    return JSON.stringify(event, (_key, value) => (typeof value === 'bigint' ? value.toString() : value));
}

/**
 * Publishes committed events to the notifications topic, keyed by stake id.
 */
export async function publishEvents(events: EventDocument[]): Promise<void> {
    if (!settings.useNotification) return;
    for (const event of events) {
        const key = event.stakeId !== null ? event.stakeId.toString() : event.actor;
        try {
            await sendKafkaEvent(settings.kafkaNotificationsTopic, serializeEvent(event), key);
        } catch (kafkaError) {
            // The event is already committed; publishing is best effort.
            logger.error(
                `[event-logger] Failed to send event ${event._id} (Key: ${key}) to Kafka topic '${settings.kafkaNotificationsTopic}': ${kafkaError instanceof Error ? kafkaError.message : String(kafkaError)}`
            );
        }
    }
}
