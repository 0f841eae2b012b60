import { isFiniteNumber } from 'util/math';
import type { BoundaryWall, PaddleSpec, WallType } from './contracts';

const UNIT_LENGTH_TOLERANCE = 1e-6;
const WALL_TYPES: readonly WallType[] = ['top', 'left', 'right'];

/**
 * Problems with the paddle reference; an empty list means the simulation can use it.
 */
export const collectPaddleIssues = (paddle: PaddleSpec | null | undefined): string[] => {
    if (!paddle) {
        return ['paddle reference is missing'];
    }

    const issues: string[] = [];
    if (!isFiniteNumber(paddle.x) || !isFiniteNumber(paddle.y)) {
        issues.push('paddle position must be finite');
    }
    if (!isFiniteNumber(paddle.halfWidth) || paddle.halfWidth <= 0) {
        issues.push('paddle half-width must be positive');
    }
    if (!isFiniteNumber(paddle.halfHeight) || paddle.halfHeight <= 0) {
        issues.push('paddle half-height must be positive');
    }

    const bounds = paddle.bounds;
    if (!bounds || !isFiniteNumber(bounds.minX) || !isFiniteNumber(bounds.maxX)) {
        issues.push('paddle movement bounds must be finite');
    } else if (bounds.maxX - bounds.minX < 2 * paddle.halfWidth) {
        issues.push('paddle movement bounds must be at least as wide as the paddle');
    }

    return issues;
};

export const collectWallIssues = (walls: readonly BoundaryWall[]): string[] => {
    const issues: string[] = [];
    const seen = new Set<string>();

    walls.forEach((wall, index) => {
        const label = `walls[${index}]`;
        if (typeof wall.id !== 'string' || wall.id.trim() === '') {
            issues.push(`${label}.id must be a non-empty string`);
        } else if (seen.has(wall.id)) {
            issues.push(`${label}.id "${wall.id}" is used by more than one wall`);
        } else {
            seen.add(wall.id);
        }

        if (!WALL_TYPES.includes(wall.type)) {
            issues.push(`${label}.type must be one of ${WALL_TYPES.join(', ')}`);
        }
        if (!isFiniteNumber(wall.point?.x) || !isFiniteNumber(wall.point?.y)) {
            issues.push(`${label}.point must have finite coordinates`);
        }

        const length = Math.hypot(wall.normal?.x ?? Number.NaN, wall.normal?.y ?? Number.NaN);
        if (!isFiniteNumber(length) || Math.abs(length - 1) > UNIT_LENGTH_TOLERANCE) {
            issues.push(`${label}.normal must be a unit vector`);
        }
        if (!isFiniteNumber(wall.thickness) || wall.thickness <= 0) {
            issues.push(`${label}.thickness must be positive`);
        }
    });

    return issues;
};
