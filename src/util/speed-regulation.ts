/**
 * Speed Regulation Utilities
 *
 * Keeps the ball between a playable minimum and a maximum that detection can still sample.
 * Runs after every velocity-changing response and once per tick as a drift-correction pass.
 */

import { Vector } from 'physics/matter';
import type { Vector2 } from 'types/input';

export interface SpeedLimits {
    readonly minSpeed: number;
    readonly maxSpeed: number;
    /** Below this magnitude the direction is unusable and the velocity is left untouched. */
    readonly degenerateSpeed: number;
}

/**
 * Rescale a velocity into [minSpeed, maxSpeed] while preserving its direction.
 *
 * @returns A new vector; the input is never mutated
 */
export function governVelocity(velocity: Vector2, limits: SpeedLimits): Vector2 {
    const speed = Vector.magnitude(velocity);

    // No direction to preserve; the stuck-ball watchdog handles this case.
    if (speed < limits.degenerateSpeed) {
        return { x: velocity.x, y: velocity.y };
    }

    if (speed < limits.minSpeed) {
        return Vector.mult(velocity, limits.minSpeed / speed);
    }

    if (speed > limits.maxSpeed) {
        return Vector.mult(velocity, limits.maxSpeed / speed);
    }

    return { x: velocity.x, y: velocity.y };
}

/**
 * Check if a velocity's magnitude is within [minSpeed, maxSpeed]
 */
export function isSpeedWithinRange(velocity: Vector2, limits: SpeedLimits): boolean {
    const speed = Vector.magnitude(velocity);
    return speed >= limits.minSpeed && speed <= limits.maxSpeed;
}

export function getSpeedDebugInfo(
    velocity: Vector2,
    limits: SpeedLimits,
): {
    currentSpeed: number;
    minSpeed: number;
    maxSpeed: number;
    isDegenerate: boolean;
    isTooSlow: boolean;
    isTooFast: boolean;
    isWithinRange: boolean;
} {
    const speed = Vector.magnitude(velocity);

    return {
        currentSpeed: speed,
        minSpeed: limits.minSpeed,
        maxSpeed: limits.maxSpeed,
        isDegenerate: speed < limits.degenerateSpeed,
        isTooSlow: speed < limits.minSpeed,
        isTooFast: speed > limits.maxSpeed,
        isWithinRange: speed >= limits.minSpeed && speed <= limits.maxSpeed,
    };
}
