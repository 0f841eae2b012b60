import { Vector } from './matter';
import { boxContainsPoint, signedDistanceToPlane } from 'util/geometry';
import { clamp } from 'util/math';
import type { GameConfig } from 'config/game';
import type { Vector2, Viewport } from 'types/input';
import type { BoundaryWall, DeathZoneRegion, PaddleSpec } from './contracts';

export type DeathZoneSettings = GameConfig['deathZone'];

/**
 * Mirror the component of `velocity` along the wall normal. Tangential motion is kept and a
 * velocity already leaving the wall is returned unchanged.
 */
export const reflectFromWall = (velocity: Vector2, normal: Vector2): Vector2 => {
    const along = Vector.dot(velocity, normal);
    if (along >= 0) {
        return { x: velocity.x, y: velocity.y };
    }

    return Vector.sub(velocity, Vector.mult(normal, 2 * along));
};

/**
 * Move a ball that overlaps the wall back onto the playfield side, just touching the surface.
 */
export const pushOutOfWall = (position: Vector2, radius: number, wall: BoundaryWall): Vector2 => {
    const separation = signedDistanceToPlane(position, wall.point, wall.normal);
    if (separation >= radius) {
        return { x: position.x, y: position.y };
    }

    return Vector.add(position, Vector.mult(wall.normal, radius - separation));
};

export interface PlayfieldBounds {
    readonly width: number;
    readonly height: number;
    readonly wallThickness: number;
}

/**
 * Top, left and right walls around a playfield centred on the origin. The bottom stays open.
 */
export const createDefaultWalls = (playfield: PlayfieldBounds): BoundaryWall[] => {
    const halfWidth = playfield.width / 2;
    const halfHeight = playfield.height / 2;
    const thickness = playfield.wallThickness;

    return [
        { id: 'wall-top', type: 'top', point: { x: 0, y: halfHeight }, normal: { x: 0, y: -1 }, thickness },
        { id: 'wall-left', type: 'left', point: { x: -halfWidth, y: 0 }, normal: { x: 1, y: 0 }, thickness },
        { id: 'wall-right', type: 'right', point: { x: halfWidth, y: 0 }, normal: { x: -1, y: 0 }, thickness },
    ];
};

/**
 * Scale factor that keeps the death zone's gameplay distance stable across screen sizes.
 */
export const calculateResolutionScale = (viewport: Viewport | undefined, settings: DeathZoneSettings): number => {
    if (!viewport || viewport.width <= 0 || viewport.height <= 0) {
        return 1;
    }

    const widthScale = viewport.width / settings.referenceResolution.width;
    const heightScale = viewport.height / settings.referenceResolution.height;
    return clamp(Math.min(widthScale, heightScale), settings.minScale, settings.maxScale);
};

/**
 * Trigger region that follows the paddle. Its horizontal extent is widened as needed to span the
 * whole playfield, so a ball can't fall past it at any paddle position. A crossing is reported
 * once; the trigger re-arms only after the ball has been seen outside the region again or the
 * ball was reset.
 */
export class DeathZoneTrigger {
    private scale: number;

    private current: DeathZoneRegion;

    private armed = true;

    constructor(
        private readonly settings: DeathZoneSettings,
        private readonly playfield: PlayfieldBounds,
        paddle: PaddleSpec,
        viewport?: Viewport,
    ) {
        this.scale = calculateResolutionScale(viewport, settings);
        this.current = this.computeRegion(paddle);
    }

    setViewport(viewport: Viewport | undefined, paddle: PaddleSpec): void {
        this.scale = calculateResolutionScale(viewport, this.settings);
        this.current = this.computeRegion(paddle);
    }

    reposition(paddle: PaddleSpec): DeathZoneRegion {
        this.current = this.computeRegion(paddle);
        return this.current;
    }

    region(): DeathZoneRegion {
        return this.current;
    }

    /**
     * @returns true when this contact is the first of a new crossing
     */
    registerContact(): boolean {
        if (!this.armed) {
            return false;
        }

        this.armed = false;
        return true;
    }

    refresh(ballPosition: Vector2): void {
        if (!this.armed && !boxContainsPoint(this.current, ballPosition)) {
            this.armed = true;
        }
    }

    rearm(): void {
        this.armed = true;
    }

    private computeRegion(paddle: PaddleSpec): DeathZoneRegion {
        const centerX = paddle.x + this.settings.horizontalOffset;
        const halfWidth = (this.settings.triggerSize.width * this.scale) / 2;
        const fieldHalfWidth = this.playfield.width / 2;
        const left = Math.min(centerX - halfWidth, -fieldHalfWidth);
        const right = Math.max(centerX + halfWidth, fieldHalfWidth);

        return {
            center: {
                x: (left + right) / 2,
                y: paddle.y - this.settings.paddleOffset * this.scale,
            },
            halfWidth: (right - left) / 2,
            halfHeight: (this.settings.triggerSize.height * this.scale) / 2,
        };
    }
}
