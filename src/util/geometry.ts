/**
 * Geometry Utilities
 *
 * Circle-versus-box and swept-circle queries used by collision detection and tunneling recovery.
 * Boxes are axis-aligned.
 */

import { Vector } from 'physics/matter';
import type { Box, Vector2 } from 'types/input';
import { clamp } from './math';

const PARALLEL_EPSILON = 1e-12;

export interface SweepHit {
    /** Fraction of the segment travelled before first contact, in [0, 1]. */
    readonly time: number;
    /** Unit normal of the surface that was entered, pointing back towards the start. */
    readonly normal: Vector2;
}

export function pointAlong(start: Vector2, end: Vector2, time: number): Vector2 {
    return Vector.add(start, Vector.mult(Vector.sub(end, start), time));
}

export function distance(a: Vector2, b: Vector2): number {
    return Vector.magnitude(Vector.sub(a, b));
}

export function closestPointOnBox(point: Vector2, box: Box): Vector2 {
    return {
        x: clamp(point.x, box.center.x - box.halfWidth, box.center.x + box.halfWidth),
        y: clamp(point.y, box.center.y - box.halfHeight, box.center.y + box.halfHeight),
    };
}

export function boxContainsPoint(box: Box, point: Vector2): boolean {
    return Math.abs(point.x - box.center.x) <= box.halfWidth &&
        Math.abs(point.y - box.center.y) <= box.halfHeight;
}

export function circleIntersectsBox(center: Vector2, radius: number, box: Box): boolean {
    const closest = closestPointOnBox(center, box);
    const dx = center.x - closest.x;
    const dy = center.y - closest.y;
    return dx * dx + dy * dy < radius * radius;
}

/**
 * Smallest move that leaves the circle just touching the box along its contact normal.
 */
export function separateCircleFromBox(center: Vector2, radius: number, box: Box): Vector2 {
    const normal = boxContactNormal(center, box);
    if (!boxContainsPoint(box, center)) {
        const closest = closestPointOnBox(center, box);
        if (distance(center, closest) >= radius) {
            return { x: center.x, y: center.y };
        }
        return Vector.add(closest, Vector.mult(normal, radius));
    }

    if (normal.x !== 0) {
        return { x: box.center.x + normal.x * (box.halfWidth + radius), y: center.y };
    }
    return { x: center.x, y: box.center.y + normal.y * (box.halfHeight + radius) };
}

/**
 * Outward normal of the box face a circle is pressing against. When the centre is inside the
 * box the axis of least penetration wins.
 */
export function boxContactNormal(center: Vector2, box: Box): Vector2 {
    const closest = closestPointOnBox(center, box);
    const offset = Vector.sub(center, closest);
    if (Vector.magnitude(offset) > PARALLEL_EPSILON) {
        return Vector.normalise(offset);
    }

    const dx = center.x - box.center.x;
    const dy = center.y - box.center.y;
    const penetrationX = box.halfWidth - Math.abs(dx);
    const penetrationY = box.halfHeight - Math.abs(dy);
    if (penetrationX < penetrationY) {
        return { x: dx < 0 ? -1 : 1, y: 0 };
    }
    return { x: 0, y: dy < 0 ? -1 : 1 };
}

/**
 * Signed distance of a point from a plane through `surfacePoint` with unit `normal`.
 */
export function signedDistanceToPlane(point: Vector2, surfacePoint: Vector2, normal: Vector2): number {
    return Vector.dot(Vector.sub(point, surfacePoint), normal);
}

/**
 * Swept circle against the front face of a plane. Only an entry from the front side counts;
 * a segment that starts already touching or behind the face returns null.
 */
export function sweepCircleAgainstPlane(
    start: Vector2,
    end: Vector2,
    radius: number,
    surfacePoint: Vector2,
    normal: Vector2,
): SweepHit | null {
    const startDistance = signedDistanceToPlane(start, surfacePoint, normal) - radius;
    const endDistance = signedDistanceToPlane(end, surfacePoint, normal) - radius;

    if (startDistance < 0 || endDistance >= 0) {
        return null;
    }

    const time = startDistance / (startDistance - endDistance);
    return { time: clamp(time, 0, 1), normal };
}

interface AxisEntry {
    readonly near: number;
    readonly far: number;
    readonly sign: number;
}

const sweepAxis = (start: number, delta: number, min: number, max: number): AxisEntry | null => {
    if (Math.abs(delta) < PARALLEL_EPSILON) {
        if (start < min || start > max) {
            return null;
        }
        return { near: Number.NEGATIVE_INFINITY, far: Number.POSITIVE_INFINITY, sign: 0 };
    }

    if (delta > 0) {
        return { near: (min - start) / delta, far: (max - start) / delta, sign: -1 };
    }
    return { near: (max - start) / delta, far: (min - start) / delta, sign: 1 };
};

/**
 * Segment against an axis-aligned box (slab method). Returns null when the segment starts
 * inside the box or never reaches it within [0, 1].
 */
function sweepPointAgainstBox(start: Vector2, end: Vector2, box: Box): SweepHit | null {
    const delta = Vector.sub(end, start);
    const xAxis = sweepAxis(start.x, delta.x, box.center.x - box.halfWidth, box.center.x + box.halfWidth);
    const yAxis = sweepAxis(start.y, delta.y, box.center.y - box.halfHeight, box.center.y + box.halfHeight);

    if (!xAxis || !yAxis) {
        return null;
    }

    const enter = Math.max(xAxis.near, yAxis.near);
    const exit = Math.min(xAxis.far, yAxis.far);

    if (enter > exit || enter < 0 || enter > 1) {
        return null;
    }

    const normal: Vector2 = xAxis.near >= yAxis.near
        ? { x: xAxis.sign, y: 0 }
        : { x: 0, y: yAxis.sign };

    return { time: enter, normal };
}

function sweepPointAgainstCircle(start: Vector2, end: Vector2, center: Vector2, radius: number): SweepHit | null {
    const delta = Vector.sub(end, start);
    const offset = Vector.sub(start, center);
    const a = Vector.dot(delta, delta);
    if (a < PARALLEL_EPSILON) {
        return null;
    }

    const b = 2 * Vector.dot(offset, delta);
    const c = Vector.dot(offset, offset) - radius * radius;
    const discriminant = b * b - 4 * a * c;
    if (c < 0 || discriminant < 0) {
        return null;
    }

    const time = (-b - Math.sqrt(discriminant)) / (2 * a);
    if (time < 0 || time > 1) {
        return null;
    }

    const contact = pointAlong(start, end, time);
    return { time, normal: Vector.normalise(Vector.sub(contact, center)) };
}

/**
 * Swept circle against an axis-aligned box: the segment is tested against the box grown by the
 * radius with rounded corners. Returns null when the circle already overlaps the box at the
 * start or does not reach it within the segment.
 */
export function sweepCircleAgainstBox(start: Vector2, end: Vector2, radius: number, box: Box): SweepHit | null {
    if (circleIntersectsBox(start, radius, box)) {
        return null;
    }

    const candidates: (SweepHit | null)[] = [
        sweepPointAgainstBox(start, end, { ...box, halfWidth: box.halfWidth + radius }),
        sweepPointAgainstBox(start, end, { ...box, halfHeight: box.halfHeight + radius }),
    ];

    if (radius > 0) {
        for (const sx of [-1, 1]) {
            for (const sy of [-1, 1]) {
                const corner = {
                    x: box.center.x + sx * box.halfWidth,
                    y: box.center.y + sy * box.halfHeight,
                };
                candidates.push(sweepPointAgainstCircle(start, end, corner, radius));
            }
        }
    }

    let earliest: SweepHit | null = null;
    for (const hit of candidates) {
        if (hit && (!earliest || hit.time < earliest.time)) {
            earliest = hit;
        }
    }
    return earliest;
}

/**
 * Whether a segment touches a box at any point (trigger regions, no radius).
 */
export function segmentTouchesBox(start: Vector2, end: Vector2, box: Box): boolean {
    if (boxContainsPoint(box, start) || boxContainsPoint(box, end)) {
        return true;
    }
    return sweepPointAgainstBox(start, end, box) !== null;
}
