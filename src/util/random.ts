export type RandomSource = () => number;

const UINT32_MAX = 0xffffffff;
const DEFAULT_SEED = 1;

const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = seed >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

const fallbackSeed = (): number => {
    const random = Math.floor(Math.random() * UINT32_MAX);
    return random === 0 ? DEFAULT_SEED : random;
};

/**
 * Small seeded generator; the same seed always replays the same launch directions.
 */
export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface RandomManager {
    readonly seed: () => number;
    readonly reset: () => void;
    readonly random: RandomSource;
    /** Uniform value in [min, max). */
    readonly range: (min: number, max: number) => number;
}

export const createRandomManager = (seed?: number | null): RandomManager => {
    const currentSeed = seed === null || seed === undefined ? fallbackSeed() : normalizeSeed(seed);
    let generator = mulberry32(currentSeed);

    const reset = () => {
        generator = mulberry32(currentSeed);
    };

    const random: RandomSource = () => generator();

    const range = (min: number, max: number): number => {
        if (!Number.isFinite(min) || !Number.isFinite(max) || max < min) {
            throw new RangeError('range requires finite bounds with min <= max');
        }
        return min + random() * (max - min);
    };

    return {
        seed: () => currentSeed,
        reset,
        random,
        range,
    };
};
