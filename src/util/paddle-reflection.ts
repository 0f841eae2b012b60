/**
 * Paddle Reflection Utilities
 *
 * Gives the player control over the outgoing direction: where the ball meets the paddle picks the
 * bounce angle, the incoming speed is kept. Angles are degrees from the horizontal, 90 = straight up.
 */

import type { Vector2 } from 'types/input';
import { clamp, degreesToRadians, isFiniteNumber, lerp } from './math';

export interface BounceAngleRange {
    /** Angle for a hit on the right edge (offset +1). */
    readonly minAngle: number;
    /** Angle for a hit on the left edge (offset -1). */
    readonly maxAngle: number;
}

export interface PaddleGeometry {
    readonly x: number;
    readonly halfWidth: number;
}

export interface PaddleReflection {
    readonly angle: number;
    /** Normalized hit offset, or null when it could not be resolved. */
    readonly offset: number | null;
    readonly velocity: Vector2;
}

export const VERTICAL_BOUNCE_ANGLE = 90;

/**
 * Get the normalized hit position on the paddle (0 = centre, -1 = left edge, +1 = right edge)
 *
 * @returns The clamped offset, or null for a zero-width paddle or a non-finite contact
 */
export function getHitOffset(contactX: number, paddleX: number, halfWidth: number): number | null {
    if (!isFiniteNumber(contactX) || !isFiniteNumber(paddleX) || !isFiniteNumber(halfWidth) || halfWidth <= 0) {
        return null;
    }

    return clamp((contactX - paddleX) / halfWidth, -1, 1);
}

/**
 * Map a hit offset onto the configured angle range. Contacts computed slightly outside the
 * paddle are clamped first so the angle never leaves [minAngle, maxAngle].
 */
export function calculateBounceAngle(offset: number, range: BounceAngleRange): number {
    const clamped = clamp(offset, -1, 1);
    return lerp(range.maxAngle, range.minAngle, (clamped + 1) / 2);
}

export function calculateBounceVelocity(angleDegrees: number, speed: number): Vector2 {
    const radians = degreesToRadians(angleDegrees);
    return {
        x: Math.cos(radians) * speed,
        y: Math.sin(radians) * speed,
    };
}

/**
 * Outgoing velocity for a ball that touched the paddle at `contactX`. Falls back to a vertical
 * bounce when the offset cannot be resolved.
 */
export function reflectOffPaddle(
    contactX: number,
    paddle: PaddleGeometry,
    speed: number,
    range: BounceAngleRange,
): PaddleReflection {
    const offset = getHitOffset(contactX, paddle.x, paddle.halfWidth);
    const angle = offset === null ? VERTICAL_BOUNCE_ANGLE : calculateBounceAngle(offset, range);

    return {
        angle,
        offset,
        velocity: calculateBounceVelocity(angle, speed),
    };
}
