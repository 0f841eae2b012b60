import { describe, expect, it } from 'vitest';
import {
    detectBrickContact,
    detectContacts,
    detectDeathZoneContact,
    detectPaddleContact,
    detectWallContact,
    type BallSample,
    type CollisionScene,
} from 'physics/collision-detection';
import type { BoundaryWall, BrickSnapshot, PaddleSpec } from 'physics/contracts';

const topWall: BoundaryWall = { id: 'wall-top', type: 'top', point: { x: 0, y: 6 }, normal: { x: 0, y: -1 }, thickness: 0.5 };

const paddle: PaddleSpec = { x: 0, y: -5, halfWidth: 1.5, halfHeight: 0.25, bounds: { minX: -10, maxX: 10 } };

const brick: BrickSnapshot = {
    id: 'b1',
    type: 'normal',
    position: { x: 0, y: 3 },
    halfSize: { width: 1, height: 0.3 },
    hitPoints: 1,
    destroyed: false,
    hitCount: 0,
};

const sample = (x: number, y: number, vx = 0, vy = 8, previous = { x, y }): BallSample => ({
    position: { x, y },
    previousPosition: previous,
    velocity: { x: vx, y: vy },
    radius: 0.25,
});

describe('collision detection', () => {
    it('detects a ball overlapping the wall surface', () => {
        const event = detectWallContact(sample(1, 5.9), topWall, 4);
        expect(event).toMatchObject({
            tick: 4,
            categories: ['ball', 'boundary'],
            colliderId: 'wall-top',
            normal: { x: 0, y: -1 },
            approachSpeed: 8,
            synthesized: false,
        });
        expect(event?.contactPoint.x).toBe(1);
        expect(event?.contactPoint.y).toBeCloseTo(6, 10);
    });

    it('misses a ball that went fully through the slab', () => {
        expect(detectWallContact(sample(1, 6.8), topWall, 1)).toBeNull();
        expect(detectWallContact(sample(1, 5.7), topWall, 1)).toBeNull();
    });

    it('detects the paddle from above with an upward normal', () => {
        const event = detectPaddleContact(sample(0.75, -4.6, 0, -8), paddle, 2);
        expect(event).toMatchObject({
            categories: ['ball', 'paddle'],
            colliderId: 'paddle',
            normal: { x: 0, y: 1 },
            approachSpeed: 8,
        });
        expect(event?.contactPoint.x).toBe(0.75);
        expect(event?.contactPoint.y).toBeCloseTo(-4.75, 10);
    });

    it('reports zero approach speed for a separating contact', () => {
        expect(detectPaddleContact(sample(0, -4.6, 0, 8), paddle, 2)?.approachSpeed).toBe(0);
    });

    it('detects bricks by id', () => {
        expect(detectBrickContact(sample(0, 2.6), brick, 3)).toMatchObject({
            categories: ['ball', 'brick'],
            colliderId: 'b1',
            normal: { x: 0, y: -1 },
        });
        expect(detectBrickContact(sample(0, 2), brick, 3)).toBeNull();
    });

    it('detects the death zone across the swept path', () => {
        const region = { center: { x: 0, y: -7 }, halfWidth: 15, halfHeight: 1 };
        const event = detectDeathZoneContact(sample(0, -8.5, 0, -15, { x: 0, y: -5.5 }), region, 9);
        expect(event).toMatchObject({ categories: ['ball', 'death-zone'], colliderId: 'death-zone' });
        expect(detectDeathZoneContact(sample(0, -4, 0, -8, { x: 0, y: -3.9 }), region, 9)).toBeNull();
    });

    it('collects contacts in scene order and honours exclusions', () => {
        const scene: CollisionScene = {
            walls: [topWall],
            paddle,
            bricks: [brick, { ...brick, id: 'gone', destroyed: true }],
            deathZone: { center: { x: 0, y: -7 }, halfWidth: 15, halfHeight: 1 },
        };
        const ball = sample(0, 2.6);

        expect(detectContacts(ball, scene, 1).map((event) => event.colliderId)).toEqual(['b1']);
        expect(detectContacts(ball, scene, 1, new Set(['b1']))).toEqual([]);
    });
});
