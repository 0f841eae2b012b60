import { rootLogger, type Logger } from 'util/log';
import type { BrickType, WallType } from 'physics/contracts';

export interface VectorLike {
    readonly x: number;
    readonly y: number;
}

export interface PaddleBouncePayload {
    readonly contactPoint: VectorLike;
    /** Degrees from the horizontal, 90 = straight up. */
    readonly resultingAngle: number;
    readonly speed: number;
}

export interface WallBouncePayload {
    readonly wallType: WallType;
    readonly contactPoint: VectorLike;
    readonly speed: number;
}

export interface BrickHitPayload {
    readonly brickId: string;
    readonly remainingHitPoints: number;
}

export interface BrickDestroyedPayload {
    readonly brickId: string;
    readonly brickType: BrickType;
    readonly position: VectorLike;
}

export interface BallLostPayload {
    readonly position: VectorLike;
}

export type AnomalyKind = 'stuck-ball' | 'tunneling';

export interface AnomalyCorrectedPayload {
    readonly kind: AnomalyKind;
    readonly position: VectorLike;
}

export interface BallLaunchedPayload {
    readonly position: VectorLike;
    readonly direction: VectorLike;
    readonly speed: number;
}

export interface LevelClearedPayload {
    readonly tick: number;
}

export interface BreakoutEventMap {
    readonly PaddleBounce: PaddleBouncePayload;
    readonly WallBounce: WallBouncePayload;
    readonly BrickHit: BrickHitPayload;
    readonly BrickDestroyed: BrickDestroyedPayload;
    readonly BallLost: BallLostPayload;
    readonly AnomalyCorrected: AnomalyCorrectedPayload;
    readonly BallLaunched: BallLaunchedPayload;
    readonly LevelCleared: LevelClearedPayload;
}

export type BreakoutEventName = keyof BreakoutEventMap;

export const BREAKOUT_EVENT_NAMES: readonly BreakoutEventName[] = [
    'PaddleBounce',
    'WallBounce',
    'BrickHit',
    'BrickDestroyed',
    'BallLost',
    'AnomalyCorrected',
    'BallLaunched',
    'LevelCleared',
];

export interface EventEnvelope<EventName extends BreakoutEventName> {
    readonly type: EventName;
    /** Simulated milliseconds since the simulation started. */
    readonly timestamp: number;
    readonly payload: BreakoutEventMap[EventName];
}

export type EventListener<EventName extends BreakoutEventName> = (
    event: EventEnvelope<EventName>,
) => void;

/**
 * Write side handed to collision handlers; the simulation decides when the events go out.
 */
export type EventSink = <EventName extends BreakoutEventName>(
    type: EventName,
    payload: BreakoutEventMap[EventName],
) => void;

export interface BreakoutEventBus {
    publish<EventName extends BreakoutEventName>(
        this: void,
        type: EventName,
        payload: BreakoutEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends BreakoutEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    subscribeOnce<EventName extends BreakoutEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends BreakoutEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
    listeners<EventName extends BreakoutEventName>(
        this: void,
        type: EventName,
    ): readonly EventListener<EventName>[];
}

type InternalListener = EventListener<BreakoutEventName>;

type ListenerRegistry = Map<BreakoutEventName, Set<InternalListener>>;

const ensureListenerSet = (registry: ListenerRegistry, type: BreakoutEventName): Set<InternalListener> => {
    const existing = registry.get(type);
    if (existing) {
        return existing;
    }

    const created = new Set<InternalListener>();
    registry.set(type, created);
    return created;
};

const toEnvelope = <EventName extends BreakoutEventName>(
    type: EventName,
    payload: BreakoutEventMap[EventName],
    timestamp: number,
): EventEnvelope<EventName> => ({
    type,
    payload,
    timestamp,
});

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface EventBusOptions {
    readonly now?: () => number;
    readonly logger?: Logger;
}

/**
 * Typed, synchronous event bus. Delivery is fire-and-forget: a listener that throws is logged
 * and skipped, and the remaining listeners still receive the event.
 */
export const createEventBus = (options: EventBusOptions = {}): BreakoutEventBus => {
    const registry: ListenerRegistry = new Map();
    const resolveNow = options.now ?? Date.now;
    const logger = options.logger ?? rootLogger.child('events');

    const publish: BreakoutEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry.get(type);
        if (!listeners || listeners.size === 0) {
            return;
        }

        const envelope = toEnvelope(type, payload, timestamp);
        for (const listener of Array.from(listeners)) {
            try {
                listener(envelope);
            } catch (error) {
                logger.error('Event listener failed', { type, error: describeError(error) });
            }
        }
    };

    const unsubscribe: BreakoutEventBus['unsubscribe'] = (type, listener) => {
        const listeners = registry.get(type);
        if (!listeners) {
            return;
        }

        listeners.delete(listener as InternalListener);
        if (listeners.size === 0) {
            registry.delete(type);
        }
    };

    const subscribe: BreakoutEventBus['subscribe'] = (type, listener) => {
        const listeners = ensureListenerSet(registry, type);
        listeners.add(listener as InternalListener);
        return () => unsubscribe(type, listener);
    };

    const subscribeOnce: BreakoutEventBus['subscribeOnce'] = (type, listener) => {
        const release = subscribe(type, (event) => {
            release();
            listener(event);
        });
        return release;
    };

    const clear: BreakoutEventBus['clear'] = () => {
        registry.clear();
    };

    const listeners: BreakoutEventBus['listeners'] = (type) => {
        const listenersForType = registry.get(type);
        if (!listenersForType) {
            return [];
        }

        return Array.from(listenersForType) as EventListener<typeof type>[];
    };

    return {
        publish,
        subscribe,
        subscribeOnce,
        unsubscribe,
        clear,
        listeners,
    };
};
