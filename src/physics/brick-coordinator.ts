/**
 * Brick Destruction Coordinator
 *
 * Owns brick hit-points for a level. A brick is destroyed at most once and leaves the active
 * collision set the moment it is destroyed.
 */

import { ConfigurationError } from 'app/errors';
import { isFiniteNumber } from 'util/math';
import type { BrickSnapshot, BrickSpec, BrickType } from './contracts';

export const BRICK_TYPES: readonly BrickType[] = ['normal', 'reinforced', 'indestructible', 'power-up'];

export const DEFAULT_BRICK_HIT_POINTS: Record<BrickType, number> = {
    normal: 1,
    reinforced: 2,
    indestructible: 0,
    'power-up': 1,
};

export type BrickHitOutcome =
    | { readonly kind: 'ignored' }
    | { readonly kind: 'hit'; readonly brick: BrickSnapshot; readonly remainingHitPoints: number }
    | { readonly kind: 'destroyed'; readonly brick: BrickSnapshot };

interface BrickRecord {
    readonly spec: BrickSpec;
    hitPoints: number;
    destroyed: boolean;
    hitCount: number;
}

const isBrickType = (value: unknown): value is BrickType =>
    typeof value === 'string' && BRICK_TYPES.some((type) => type === value);

const resolveHitPoints = (spec: BrickSpec): number =>
    (spec.type === 'indestructible' ? 0 : spec.hitPoints ?? DEFAULT_BRICK_HIT_POINTS[spec.type]);

/**
 * Lists every problem with a brick layout; an empty list means it can be loaded.
 */
export const collectBrickIssues = (bricks: readonly BrickSpec[]): string[] => {
    const issues: string[] = [];
    if (bricks.length === 0) {
        issues.push('brick layout must contain at least one brick');
        return issues;
    }

    const seen = new Set<string>();
    bricks.forEach((brick, index) => {
        const label = `bricks[${index}]`;
        if (typeof brick.id !== 'string' || brick.id.trim() === '') {
            issues.push(`${label}.id must be a non-empty string`);
        } else if (seen.has(brick.id)) {
            issues.push(`${label}.id "${brick.id}" is used by more than one brick`);
        } else {
            seen.add(brick.id);
        }

        if (!isBrickType(brick.type)) {
            issues.push(`${label}.type must be one of ${BRICK_TYPES.join(', ')}`);
            return;
        }

        if (!isFiniteNumber(brick.position?.x) || !isFiniteNumber(brick.position?.y)) {
            issues.push(`${label}.position must have finite coordinates`);
        }

        const { halfSize } = brick;
        if (!isFiniteNumber(halfSize?.width) || !isFiniteNumber(halfSize?.height) ||
            halfSize.width <= 0 || halfSize.height <= 0) {
            issues.push(`${label}.halfSize must be positive`);
        }

        if (brick.type !== 'indestructible' && brick.hitPoints !== undefined) {
            if (!Number.isInteger(brick.hitPoints) || brick.hitPoints < 1) {
                issues.push(`${label}.hitPoints must be an integer of at least 1`);
            }
        }
    });

    return issues;
};

const toSnapshot = (record: BrickRecord): BrickSnapshot => ({
    id: record.spec.id,
    type: record.spec.type,
    position: { x: record.spec.position.x, y: record.spec.position.y },
    halfSize: { width: record.spec.halfSize.width, height: record.spec.halfSize.height },
    hitPoints: record.hitPoints,
    destroyed: record.destroyed,
    hitCount: record.hitCount,
});

export class BrickDestructionCoordinator {
    private readonly records = new Map<string, BrickRecord>();

    /**
     * @throws ConfigurationError when the layout is empty or contains an invalid brick
     */
    constructor(bricks: readonly BrickSpec[]) {
        const issues = collectBrickIssues(bricks);
        if (issues.length > 0) {
            throw new ConfigurationError(issues);
        }

        for (const spec of bricks) {
            this.records.set(spec.id, {
                spec,
                hitPoints: resolveHitPoints(spec),
                destroyed: false,
                hitCount: 0,
            });
        }
    }

    /**
     * Apply one ball contact. Unknown and already destroyed bricks are ignored, so a second
     * contact in the same tick cannot destroy a brick twice.
     */
    registerHit(brickId: string): BrickHitOutcome {
        const record = this.records.get(brickId);
        if (!record || record.destroyed) {
            return { kind: 'ignored' };
        }

        record.hitCount += 1;
        if (record.spec.type === 'indestructible') {
            return { kind: 'hit', brick: toSnapshot(record), remainingHitPoints: record.hitPoints };
        }

        record.hitPoints = Math.max(0, record.hitPoints - 1);
        if (record.hitPoints > 0) {
            return { kind: 'hit', brick: toSnapshot(record), remainingHitPoints: record.hitPoints };
        }

        record.destroyed = true;
        return { kind: 'destroyed', brick: toSnapshot(record) };
    }

    activeBricks(): BrickSnapshot[] {
        const active: BrickSnapshot[] = [];
        for (const record of this.records.values()) {
            if (!record.destroyed) {
                active.push(toSnapshot(record));
            }
        }
        return active;
    }

    allBricks(): BrickSnapshot[] {
        return Array.from(this.records.values(), toSnapshot);
    }

    getBrick(brickId: string): BrickSnapshot | undefined {
        const record = this.records.get(brickId);
        return record ? toSnapshot(record) : undefined;
    }

    isDestroyed(brickId: string): boolean {
        return this.records.get(brickId)?.destroyed ?? false;
    }

    remainingDestructible(): number {
        let remaining = 0;
        for (const record of this.records.values()) {
            if (!record.destroyed && record.spec.type !== 'indestructible') {
                remaining += 1;
            }
        }
        return remaining;
    }

    /**
     * A level is cleared once every destructible brick is gone. A layout made only of
     * indestructible bricks never clears.
     */
    isCleared(): boolean {
        let destructible = 0;
        for (const record of this.records.values()) {
            if (record.spec.type !== 'indestructible') {
                destructible += 1;
                if (!record.destroyed) {
                    return false;
                }
            }
        }
        return destructible > 0;
    }
}
