/**
 * Collision Core Contracts
 *
 * Data model shared by the detection step, the response handlers and the simulation aggregate.
 */

import type { Box, Vector2 } from 'types/input';

export type BallLaunchState = 'ready' | 'launching' | 'in-play';

export interface BallState {
    readonly position: Vector2;
    readonly velocity: Vector2;
    readonly radius: number;
    readonly launchState: BallLaunchState;
    /** Collision responses applied since the last launch. */
    readonly collisionCount: number;
}

export interface PaddleSpec {
    /** Centre of the paddle. */
    readonly x: number;
    readonly y: number;
    readonly halfWidth: number;
    readonly halfHeight: number;
    /** Range the paddle edges may occupy along x. */
    readonly bounds: {
        readonly minX: number;
        readonly maxX: number;
    };
}

export type BrickType = 'normal' | 'reinforced' | 'indestructible' | 'power-up';

export interface BrickSpec {
    readonly id: string;
    readonly type: BrickType;
    readonly position: Vector2;
    readonly halfSize: {
        readonly width: number;
        readonly height: number;
    };
    /** Defaults by type when omitted: normal 1, reinforced 2, indestructible 0, power-up 1. */
    readonly hitPoints?: number;
}

export interface BrickSnapshot {
    readonly id: string;
    readonly type: BrickType;
    readonly position: Vector2;
    readonly halfSize: BrickSpec['halfSize'];
    readonly hitPoints: number;
    readonly destroyed: boolean;
    readonly hitCount: number;
}

export type WallType = 'top' | 'left' | 'right';

/**
 * A wall slab. Its inner surface passes through `point`; `normal` is the unit vector from the
 * surface into the playfield and the slab extends `thickness` units behind the surface.
 */
export interface BoundaryWall {
    readonly id: string;
    readonly type: WallType;
    readonly point: Vector2;
    readonly normal: Vector2;
    readonly thickness: number;
}

export type CollisionCategory = 'ball' | 'paddle' | 'brick' | 'boundary' | 'death-zone' | 'power-up';

export interface CollisionEvent {
    readonly tick: number;
    readonly categories: readonly [CollisionCategory, CollisionCategory];
    /** Identifier of the non-ball participant (brick id, wall id, `paddle`, `death-zone`). */
    readonly colliderId: string;
    readonly contactPoint: Vector2;
    /** Unit normal pointing from the collider towards the ball. */
    readonly normal: Vector2;
    /** Closing speed along the normal at detection time; zero when separating. */
    readonly approachSpeed: number;
    /** Set when the event was reconstructed by tunneling recovery. */
    readonly synthesized: boolean;
}

export type DeathZoneRegion = Box;

export const paddleBox = (paddle: PaddleSpec): Box => ({
    center: { x: paddle.x, y: paddle.y },
    halfWidth: paddle.halfWidth,
    halfHeight: paddle.halfHeight,
});

export const brickBox = (brick: Pick<BrickSpec, 'position' | 'halfSize'>): Box => ({
    center: brick.position,
    halfWidth: brick.halfSize.width,
    halfHeight: brick.halfSize.height,
});
