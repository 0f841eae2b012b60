export const clamp = (value: number, min: number, max: number): number => {
    if (Number.isNaN(value)) {
        return min;
    }
    if (min > max) {
        return clamp(value, max, min);
    }
    if (value < min) {
        return min;
    }
    if (value > max) {
        return max;
    }
    return value;
};

export const lerp = (start: number, end: number, alpha: number): number => {
    return start + (end - start) * alpha;
};

const DEGREES_PER_RADIAN = 180 / Math.PI;

export const degreesToRadians = (degrees: number): number => degrees / DEGREES_PER_RADIAN;

export const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);
