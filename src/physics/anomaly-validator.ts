/**
 * Anomaly Validator
 *
 * Per-tick watchdog that runs whether or not anything collided: it orders simultaneous
 * contacts, recovers collisions that discrete sampling skipped over, and unsticks a ball whose
 * speed has collapsed.
 */

import { Vector } from './matter';
import { distance, pointAlong, sweepCircleAgainstBox, sweepCircleAgainstPlane, type SweepHit } from 'util/geometry';
import { clamp, degreesToRadians } from 'util/math';
import type { SpeedLimits } from 'util/speed-regulation';
import { rootLogger, type Logger } from 'util/log';
import type { Vector2 } from 'types/input';
import {
    brickBox,
    paddleBox,
    type BoundaryWall,
    type BrickSnapshot,
    type CollisionEvent,
    type PaddleSpec,
} from './contracts';
import { PADDLE_COLLIDER_ID } from './collision-detection';

const DISTANCE_TIE_EPSILON = 1e-9;
const FALLBACK_CORRECTION_ANGLE = 60;

export interface AnomalyValidatorOptions {
    readonly stuckSpeedThreshold: number;
    readonly stuckTimeoutSeconds: number;
    readonly stuckCorrectionSpeed: number;
    readonly limits: SpeedLimits;
    readonly logger?: Logger;
}

export interface SweptPath {
    readonly start: Vector2;
    readonly end: Vector2;
    readonly radius: number;
    readonly velocity: Vector2;
}

export interface SolidColliders {
    readonly walls: readonly BoundaryWall[];
    readonly paddle: PaddleSpec;
    readonly bricks: readonly BrickSnapshot[];
}

export interface TunnelingRecovery {
    /** Ball centre at the moment of first contact. */
    readonly position: Vector2;
    readonly event: CollisionEvent;
}

export interface StuckCorrection {
    readonly velocity: Vector2;
    readonly stuckSeconds: number;
}

interface SweepCandidate {
    readonly hit: SweepHit;
    readonly colliderId: string;
    readonly categories: CollisionEvent['categories'];
}

export class AnomalyValidator {
    private readonly logger: Logger;

    private stuckTimer = 0;

    private lastDirection: Vector2 | null = null;

    constructor(private readonly options: AnomalyValidatorOptions) {
        this.logger = options.logger ?? rootLogger.child('anomaly');
    }

    /**
     * Deterministic response order for contacts in the same tick: nearest contact to where the
     * ball started the tick first, then the faster approach.
     */
    orderContacts(events: readonly CollisionEvent[], previousPosition: Vector2): CollisionEvent[] {
        return events
            .map((event, index) => ({ event, index, distance: distance(previousPosition, event.contactPoint) }))
            .sort((a, b) => {
                if (Math.abs(a.distance - b.distance) > DISTANCE_TIE_EPSILON) {
                    return a.distance - b.distance;
                }
                if (a.event.approachSpeed !== b.event.approachSpeed) {
                    return b.event.approachSpeed - a.event.approachSpeed;
                }
                return a.index - b.index;
            })
            .map(({ event }) => event);
    }

    /**
     * Find the earliest solid collider the swept path crossed without a detected contact.
     *
     * @returns The position to snap back to and the synthesized event, or null when nothing was missed
     */
    recoverTunneling(
        path: SweptPath,
        colliders: SolidColliders,
        detected: ReadonlySet<string>,
        tick: number,
    ): TunnelingRecovery | null {
        const candidates: SweepCandidate[] = [];

        for (const wall of colliders.walls) {
            const hit = sweepCircleAgainstPlane(path.start, path.end, path.radius, wall.point, wall.normal);
            if (hit) {
                candidates.push({ hit, colliderId: wall.id, categories: ['ball', 'boundary'] });
            }
        }

        const paddleHit = sweepCircleAgainstBox(path.start, path.end, path.radius, paddleBox(colliders.paddle));
        if (paddleHit) {
            candidates.push({ hit: paddleHit, colliderId: PADDLE_COLLIDER_ID, categories: ['ball', 'paddle'] });
        }

        for (const brick of colliders.bricks) {
            if (brick.destroyed) {
                continue;
            }
            const hit = sweepCircleAgainstBox(path.start, path.end, path.radius, brickBox(brick));
            if (hit) {
                candidates.push({ hit, colliderId: brick.id, categories: ['ball', 'brick'] });
            }
        }

        let earliest: SweepCandidate | null = null;
        for (const candidate of candidates) {
            if (!earliest || candidate.hit.time < earliest.hit.time) {
                earliest = candidate;
            }
        }

        if (!earliest || detected.has(earliest.colliderId)) {
            return null;
        }

        const position = pointAlong(path.start, path.end, earliest.hit.time);
        const { normal } = earliest.hit;
        const event: CollisionEvent = {
            tick,
            categories: earliest.categories,
            colliderId: earliest.colliderId,
            contactPoint: Vector.sub(position, Vector.mult(normal, path.radius)),
            normal,
            approachSpeed: Math.max(0, -Vector.dot(path.velocity, normal)),
            synthesized: true,
        };

        this.logger.warn('Recovered tunneled collision', {
            tick,
            colliderId: event.colliderId,
            time: earliest.hit.time,
        });

        return { position, event };
    }

    /**
     * Advance the stuck-ball timer by one tick.
     *
     * @returns The corrective velocity once the ball has been too slow for longer than the timeout
     */
    checkStuck(velocity: Vector2, deltaSeconds: number): StuckCorrection | null {
        const speed = Vector.magnitude(velocity);
        if (speed >= this.options.limits.degenerateSpeed) {
            this.lastDirection = Vector.normalise(velocity);
        }

        if (speed > this.options.stuckSpeedThreshold) {
            this.stuckTimer = 0;
            return null;
        }

        this.stuckTimer += deltaSeconds;
        if (this.stuckTimer <= this.options.stuckTimeoutSeconds) {
            return null;
        }

        const stuckSeconds = this.stuckTimer;
        this.stuckTimer = 0;

        const direction = this.lastDirection ?? this.fallbackDirection();
        const correctionSpeed = clamp(
            this.options.stuckCorrectionSpeed,
            this.options.limits.minSpeed,
            this.options.limits.maxSpeed,
        );
        const corrected = Vector.mult(direction, correctionSpeed);

        this.logger.warn('Corrected stuck ball', { stuckSeconds, speed });

        return { velocity: corrected, stuckSeconds };
    }

    stuckSeconds(): number {
        return this.stuckTimer;
    }

    reset(): void {
        this.stuckTimer = 0;
        this.lastDirection = null;
    }

    private fallbackDirection(): Vector2 {
        const radians = degreesToRadians(FALLBACK_CORRECTION_ANGLE);
        return { x: Math.cos(radians), y: Math.sin(radians) };
    }
}
