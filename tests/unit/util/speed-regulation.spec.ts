import { describe, expect, it } from 'vitest';
import { getSpeedDebugInfo, governVelocity, isSpeedWithinRange, type SpeedLimits } from 'util/speed-regulation';

const limits: SpeedLimits = { minSpeed: 5, maxSpeed: 15, degenerateSpeed: 0.01 };
const magnitude = (v: { x: number; y: number }) => Math.hypot(v.x, v.y);

describe('speed-regulation', () => {
    describe('governVelocity', () => {
        it('leaves an in-range velocity unchanged', () => {
            expect(governVelocity({ x: 3, y: 4 }, limits)).toEqual({ x: 3, y: 4 });
        });

        it('raises a slow velocity to the minimum speed without turning it', () => {
            const governed = governVelocity({ x: 0.3, y: 0.4 }, limits);
            expect(magnitude(governed)).toBeCloseTo(5, 10);
            expect(governed.x / governed.y).toBeCloseTo(0.75, 10);
        });

        it('caps a fast velocity at the maximum speed without turning it', () => {
            const governed = governVelocity({ x: 30, y: 40 }, limits);
            expect(governed.x).toBeCloseTo(9, 10);
            expect(governed.y).toBeCloseTo(12, 10);
        });

        it('does not invent a direction for a near-zero velocity', () => {
            expect(governVelocity({ x: 0.001, y: 0 }, limits)).toEqual({ x: 0.001, y: 0 });
            expect(governVelocity({ x: 0, y: 0 }, limits)).toEqual({ x: 0, y: 0 });
        });

        it('does not mutate its input', () => {
            const velocity = { x: 30, y: 40 };
            governVelocity(velocity, limits);
            expect(velocity).toEqual({ x: 30, y: 40 });
        });
    });

    describe('isSpeedWithinRange', () => {
        it('includes both bounds', () => {
            expect(isSpeedWithinRange({ x: 5, y: 0 }, limits)).toBe(true);
            expect(isSpeedWithinRange({ x: 0, y: 15 }, limits)).toBe(true);
            expect(isSpeedWithinRange({ x: 0, y: 15.5 }, limits)).toBe(false);
            expect(isSpeedWithinRange({ x: 4.9, y: 0 }, limits)).toBe(false);
        });
    });

    describe('getSpeedDebugInfo', () => {
        it('classifies the current speed', () => {
            const info = getSpeedDebugInfo({ x: 0, y: 0.001 }, limits);
            expect(info.currentSpeed).toBeCloseTo(0.001, 12);
            expect(info).toMatchObject({
                minSpeed: 5,
                maxSpeed: 15,
                isDegenerate: true,
                isTooSlow: true,
                isTooFast: false,
                isWithinRange: false,
            });
        });
    });
});
