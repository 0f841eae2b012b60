import { collisionPairKey, isCollisionAllowed } from './collision-matrix';
import { rootLogger, type Logger } from 'util/log';
import type { Vector2 } from 'types/input';
import type { CollisionCategory, CollisionEvent } from './contracts';
import type { AnomalyValidator } from './anomaly-validator';

export type CollisionHandler = (event: CollisionEvent) => void;

export interface RouteSummary {
    readonly dispatched: number;
    /** Contacts whose category pair is not allowed to interact. */
    readonly dropped: number;
    /** Allowed contacts with no registered handler. */
    readonly unhandled: number;
}

export type ContactOrdering = Pick<AnomalyValidator, 'orderContacts'>;

/**
 * Filters a tick's contacts through the category matrix and dispatches them one at a time, in
 * the validator's order. Handlers run synchronously, so each one sees the ball state left by
 * the previous one.
 */
export class CollisionRouter {
    private readonly handlers = new Map<string, CollisionHandler>();

    private readonly logger: Logger;

    constructor(
        private readonly ordering: ContactOrdering,
        logger: Logger = rootLogger.child('collision-router'),
    ) {
        this.logger = logger;
    }

    /**
     * @throws Error when the pair is not allowed to interact or already has a handler
     */
    register(a: CollisionCategory, b: CollisionCategory, handler: CollisionHandler): void {
        if (!isCollisionAllowed(a, b)) {
            throw new Error(`Cannot register a handler for disallowed collision pair ${a}/${b}`);
        }

        const key = collisionPairKey(a, b);
        if (this.handlers.has(key)) {
            throw new Error(`A handler for ${a}/${b} is already registered`);
        }
        this.handlers.set(key, handler);
    }

    route(events: readonly CollisionEvent[], previousPosition: Vector2): RouteSummary {
        const allowed: CollisionEvent[] = [];
        let dropped = 0;

        for (const event of events) {
            const [a, b] = event.categories;
            if (isCollisionAllowed(a, b)) {
                allowed.push(event);
            } else {
                dropped += 1;
                this.logger.debug('Dropped disallowed collision pair', {
                    pair: collisionPairKey(a, b),
                    colliderId: event.colliderId,
                    tick: event.tick,
                });
            }
        }

        let dispatched = 0;
        let unhandled = 0;

        for (const event of this.ordering.orderContacts(allowed, previousPosition)) {
            const handler = this.handlers.get(collisionPairKey(event.categories[0], event.categories[1]));
            if (!handler) {
                unhandled += 1;
                this.logger.debug('No handler for collision pair', {
                    pair: collisionPairKey(event.categories[0], event.categories[1]),
                    colliderId: event.colliderId,
                });
                continue;
            }

            handler(event);
            dispatched += 1;
        }

        return { dispatched, dropped, unhandled };
    }
}
