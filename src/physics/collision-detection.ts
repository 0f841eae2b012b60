/**
 * Discrete collision detection. Samples the ball at its end-of-integration position and
 * produces one candidate CollisionEvent per overlapping collider. The death zone is a trigger
 * and is tested against the ball's swept path instead.
 */

import { Vector } from './matter';
import {
    boxContactNormal,
    circleIntersectsBox,
    closestPointOnBox,
    segmentTouchesBox,
    signedDistanceToPlane,
} from 'util/geometry';
import type { Box, Vector2 } from 'types/input';
import {
    brickBox,
    paddleBox,
    type BoundaryWall,
    type BrickSnapshot,
    type CollisionEvent,
    type DeathZoneRegion,
    type PaddleSpec,
} from './contracts';

export const PADDLE_COLLIDER_ID = 'paddle';
export const DEATH_ZONE_COLLIDER_ID = 'death-zone';

export interface BallSample {
    readonly position: Vector2;
    readonly previousPosition: Vector2;
    readonly velocity: Vector2;
    readonly radius: number;
}

export interface CollisionScene {
    readonly walls: readonly BoundaryWall[];
    readonly paddle: PaddleSpec;
    readonly bricks: readonly BrickSnapshot[];
    readonly deathZone: DeathZoneRegion;
}

const approachSpeed = (velocity: Vector2, normal: Vector2): number => Math.max(0, -Vector.dot(velocity, normal));

export const detectWallContact = (
    ball: BallSample,
    wall: BoundaryWall,
    tick: number,
): CollisionEvent | null => {
    const separation = signedDistanceToPlane(ball.position, wall.point, wall.normal);
    if (separation >= ball.radius || separation <= -(wall.thickness + ball.radius)) {
        return null;
    }

    return {
        tick,
        categories: ['ball', 'boundary'],
        colliderId: wall.id,
        contactPoint: Vector.sub(ball.position, Vector.mult(wall.normal, separation)),
        normal: wall.normal,
        approachSpeed: approachSpeed(ball.velocity, wall.normal),
        synthesized: false,
    };
};

const detectBoxContact = (
    ball: BallSample,
    box: Box,
    categories: CollisionEvent['categories'],
    colliderId: string,
    tick: number,
): CollisionEvent | null => {
    if (!circleIntersectsBox(ball.position, ball.radius, box)) {
        return null;
    }

    const normal = boxContactNormal(ball.position, box);
    return {
        tick,
        categories,
        colliderId,
        contactPoint: closestPointOnBox(ball.position, box),
        normal,
        approachSpeed: approachSpeed(ball.velocity, normal),
        synthesized: false,
    };
};

export const detectPaddleContact = (ball: BallSample, paddle: PaddleSpec, tick: number): CollisionEvent | null =>
    detectBoxContact(ball, paddleBox(paddle), ['ball', 'paddle'], PADDLE_COLLIDER_ID, tick);

export const detectBrickContact = (ball: BallSample, brick: BrickSnapshot, tick: number): CollisionEvent | null =>
    detectBoxContact(ball, brickBox(brick), ['ball', 'brick'], brick.id, tick);

export const detectDeathZoneContact = (
    ball: BallSample,
    region: DeathZoneRegion,
    tick: number,
): CollisionEvent | null => {
    if (!segmentTouchesBox(ball.previousPosition, ball.position, region)) {
        return null;
    }

    const normal = { x: 0, y: 1 };
    return {
        tick,
        categories: ['ball', 'death-zone'],
        colliderId: DEATH_ZONE_COLLIDER_ID,
        contactPoint: { x: ball.position.x, y: ball.position.y },
        normal,
        approachSpeed: approachSpeed(ball.velocity, normal),
        synthesized: false,
    };
};

/**
 * All contacts for one sample, in scene order (walls, paddle, bricks, death zone). Colliders
 * listed in `exclude` are skipped.
 */
export const detectContacts = (
    ball: BallSample,
    scene: CollisionScene,
    tick: number,
    exclude: ReadonlySet<string> = new Set(),
): CollisionEvent[] => {
    const events: CollisionEvent[] = [];
    const push = (event: CollisionEvent | null) => {
        if (event && !exclude.has(event.colliderId)) {
            events.push(event);
        }
    };

    for (const wall of scene.walls) {
        push(detectWallContact(ball, wall, tick));
    }
    push(detectPaddleContact(ball, scene.paddle, tick));
    for (const brick of scene.bricks) {
        if (!brick.destroyed) {
            push(detectBrickContact(ball, brick, tick));
        }
    }
    push(detectDeathZoneContact(ball, scene.deathZone, tick));

    return events;
};
