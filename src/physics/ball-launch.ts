/**
 * Ball Launch Controller
 *
 * Owns the ball's launch state. A launch goes ready -> launching -> in-play within one tick and
 * leaves at base speed in a seeded direction around straight up.
 */

import type { RandomSource } from 'util/random';
import { degreesToRadians } from 'util/math';
import { calculateBounceVelocity, VERTICAL_BOUNCE_ANGLE } from 'util/paddle-reflection';
import type { Vector2 } from 'types/input';
import type { BallLaunchState } from './contracts';

const TRANSITIONS: Record<BallLaunchState, readonly BallLaunchState[]> = {
    ready: ['ready', 'launching'],
    launching: ['in-play'],
    'in-play': ['ready'],
};

export const canTransition = (from: BallLaunchState, to: BallLaunchState): boolean =>
    TRANSITIONS[from].includes(to);

export interface LaunchOptions {
    readonly baseSpeed: number;
    /** Half-range of the random spread, in degrees. */
    readonly launchAngleVariance: number;
    readonly random: RandomSource;
}

export interface LaunchResult {
    /** Degrees from the horizontal. */
    readonly angle: number;
    readonly direction: Vector2;
    readonly velocity: Vector2;
}

/**
 * Launch angle in degrees: 90 plus a uniform spread in [-variance, variance).
 */
export const calculateLaunchAngle = (variance: number, random: RandomSource): number =>
    VERTICAL_BOUNCE_ANGLE + (random() * 2 - 1) * variance;

export class BallLaunchController {
    private current: BallLaunchState = 'ready';

    private lastLaunch: LaunchResult | null = null;

    constructor(private readonly options: LaunchOptions) {}

    state(): BallLaunchState {
        return this.current;
    }

    canLaunch(): boolean {
        return this.current === 'ready';
    }

    /**
     * @throws Error on a transition the launch state machine does not allow
     */
    transition(to: BallLaunchState): void {
        if (!canTransition(this.current, to)) {
            throw new Error(`Illegal ball launch transition ${this.current} -> ${to}`);
        }
        this.current = to;
    }

    launch(): LaunchResult {
        this.transition('launching');

        const angle = calculateLaunchAngle(this.options.launchAngleVariance, this.options.random);
        const radians = degreesToRadians(angle);
        const result: LaunchResult = {
            angle,
            direction: { x: Math.cos(radians), y: Math.sin(radians) },
            velocity: calculateBounceVelocity(angle, this.options.baseSpeed),
        };

        this.transition('in-play');
        this.lastLaunch = result;
        return result;
    }

    reset(): void {
        this.transition('ready');
    }

    /**
     * Put the ball in play without a launch; used for scripted placement.
     */
    forceInPlay(): void {
        this.current = 'in-play';
    }

    getLastLaunch(): LaunchResult | null {
        return this.lastLaunch;
    }
}
