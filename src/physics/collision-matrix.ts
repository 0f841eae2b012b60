import type { CollisionCategory } from './contracts';

export const COLLISION_CATEGORIES: readonly CollisionCategory[] = [
    'ball',
    'paddle',
    'brick',
    'boundary',
    'death-zone',
    'power-up',
];

type CategoryPair = readonly [CollisionCategory, CollisionCategory];

const ALLOWED_PAIRS: readonly CategoryPair[] = [
    ['ball', 'paddle'],
    ['ball', 'brick'],
    ['ball', 'boundary'],
    ['ball', 'death-zone'],
    ['paddle', 'power-up'],
    ['paddle', 'boundary'],
    ['power-up', 'boundary'],
];

/**
 * Order-independent key for a pair of categories.
 */
export const collisionPairKey = (a: CollisionCategory, b: CollisionCategory): string =>
    (a <= b ? `${a}|${b}` : `${b}|${a}`);

const ALLOWED_KEYS: ReadonlySet<string> = new Set(ALLOWED_PAIRS.map(([a, b]) => collisionPairKey(a, b)));

export const isCollisionAllowed = (a: CollisionCategory, b: CollisionCategory): boolean =>
    ALLOWED_KEYS.has(collisionPairKey(a, b));

export const allowedCollisionPairs = (): readonly CategoryPair[] => ALLOWED_PAIRS;
