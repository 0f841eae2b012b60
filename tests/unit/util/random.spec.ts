import { describe, expect, it } from 'vitest';
import { createRandomManager, mulberry32 } from 'util/random';

describe('random', () => {
    it('replays the same sequence for the same seed', () => {
        const first = mulberry32(42);
        const second = mulberry32(42);
        const a = [first(), first(), first()];
        const b = [second(), second(), second()];
        expect(a).toEqual(b);
        a.forEach((value) => {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        });
    });

    it('normalises a zero or non-finite seed', () => {
        expect(createRandomManager(0).seed()).toBe(1);
        expect(createRandomManager(Number.NaN).seed()).toBe(1);
        expect(createRandomManager(7).seed()).toBe(7);
    });

    it('picks a seed when none is given', () => {
        const seed = createRandomManager().seed();
        expect(Number.isInteger(seed)).toBe(true);
        expect(seed).toBeGreaterThan(0);
    });

    it('restarts the sequence on reset', () => {
        const random = createRandomManager(99);
        const first = random.random();
        random.random();
        random.reset();
        expect(random.random()).toBe(first);
    });

    it('draws ranged values within the bounds', () => {
        const random = createRandomManager(5);
        for (let i = 0; i < 100; i += 1) {
            const value = random.range(-0.7, 0.7);
            expect(value).toBeGreaterThanOrEqual(-0.7);
            expect(value).toBeLessThan(0.7);
        }
        expect(() => random.range(1, 0)).toThrow(RangeError);
    });
});
