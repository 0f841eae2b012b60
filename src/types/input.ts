/**
 * Shared Type Definitions
 *
 * Plain value types exchanged between the simulation core and the collaborators that drive it.
 */

/**
 * 2D vector with x and y coordinates (world units, y up)
 */
export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

/**
 * Axis-aligned box described by its centre and half extents
 */
export interface Box {
    readonly center: Vector2;
    readonly halfWidth: number;
    readonly halfHeight: number;
}

/**
 * Input sampled by the input/movement layer once per tick
 */
export interface TickInput {
    /** Requested paddle centre along its axis; omitted when the paddle did not move. */
    readonly paddleX?: number;
    /** True on the tick the player asked to launch a ready ball. */
    readonly launchRequested?: boolean;
}

/**
 * Viewport dimensions in pixels, used only for death-zone scaling
 */
export interface Viewport {
    readonly width: number;
    readonly height: number;
}
