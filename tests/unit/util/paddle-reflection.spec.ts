/**
 * Tests for Paddle Reflection Utilities
 */

import { describe, it, expect } from 'vitest';
import {
    calculateBounceAngle,
    calculateBounceVelocity,
    getHitOffset,
    reflectOffPaddle,
    type BounceAngleRange,
} from 'util/paddle-reflection';

const angles: BounceAngleRange = { minAngle: 15, maxAngle: 165 };
const paddle = { x: 4, halfWidth: 2 };

describe('paddle-reflection', () => {
    describe('calculateBounceAngle', () => {
        it('maps the edges and centre onto the configured range', () => {
            expect(calculateBounceAngle(-1, angles)).toBe(165);
            expect(calculateBounceAngle(0, angles)).toBe(90);
            expect(calculateBounceAngle(1, angles)).toBe(15);
        });

        it('follows the linear interpolation between the edges', () => {
            expect(calculateBounceAngle(0.5, angles)).toBeCloseTo(52.5, 10);
            expect(calculateBounceAngle(-0.5, angles)).toBeCloseTo(127.5, 10);
        });

        it('decreases monotonically as the hit moves right', () => {
            let previous = Number.POSITIVE_INFINITY;
            for (let step = 0; step <= 40; step += 1) {
                const offset = -1 + step / 20;
                const angle = calculateBounceAngle(offset, angles);
                expect(angle).toBeLessThan(previous);
                previous = angle;
            }
        });

        it('clamps offsets computed outside the paddle', () => {
            expect(calculateBounceAngle(2, angles)).toBe(15);
            expect(calculateBounceAngle(-3, angles)).toBe(165);
        });
    });

    describe('getHitOffset', () => {
        it('normalises the contact against the half-width', () => {
            expect(getHitOffset(5, 4, 2)).toBe(0.5);
            expect(getHitOffset(10, 4, 2)).toBe(1);
            expect(getHitOffset(-10, 4, 2)).toBe(-1);
        });

        it('cannot resolve a zero-width paddle or a non-finite contact', () => {
            expect(getHitOffset(4, 4, 0)).toBeNull();
            expect(getHitOffset(Number.NaN, 4, 2)).toBeNull();
        });
    });

    describe('calculateBounceVelocity', () => {
        it('points along the angle at the requested speed', () => {
            const velocity = calculateBounceVelocity(165, 8);
            expect(velocity.x).toBeCloseTo(8 * Math.cos((165 * Math.PI) / 180), 10);
            expect(velocity.y).toBeCloseTo(8 * Math.sin((165 * Math.PI) / 180), 10);
        });
    });

    describe('reflectOffPaddle', () => {
        it('sends a centre hit straight up at the incoming speed', () => {
            const reflection = reflectOffPaddle(4, paddle, 8, angles);
            expect(reflection.angle).toBeCloseTo(90, 10);
            expect(reflection.offset).toBe(0);
            expect(reflection.velocity.x).toBeCloseTo(0, 10);
            expect(Math.hypot(reflection.velocity.x, reflection.velocity.y)).toBeCloseTo(8, 10);
        });

        it('sends a left-edge hit out at the maximum angle', () => {
            const reflection = reflectOffPaddle(2, paddle, 8, angles);
            expect(reflection.angle).toBe(165);
            expect(reflection.velocity.x).toBeLessThan(0);
            expect(reflection.velocity.y).toBeGreaterThan(0);
        });

        it('falls back to a vertical bounce when the offset cannot be resolved', () => {
            const reflection = reflectOffPaddle(4, { x: 4, halfWidth: 0 }, 6, angles);
            expect(reflection.angle).toBe(90);
            expect(reflection.offset).toBeNull();
            expect(reflection.velocity.y).toBeCloseTo(6, 10);
        });
    });
});
