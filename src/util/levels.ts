/**
 * Level layouts
 *
 * Reads brick layouts from JSON. Only the shape is checked here; brick rules (unique ids,
 * hit-points, sizes) are enforced when the simulation loads the level.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from 'app/errors';
import { BRICK_TYPES } from 'physics/brick-coordinator';
import type { BrickSpec, BrickType } from 'physics/contracts';
import type { Vector2 } from 'types/input';

export interface LevelLayout {
    readonly name: string;
    readonly bricks: readonly BrickSpec[];
}

export const DEFAULT_LAYOUT_URL = new URL('../../levels/default.json', import.meta.url);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (value: unknown): number => (typeof value === 'number' ? value : Number.NaN);

const readVector = (value: unknown): Vector2 | null => {
    if (!isRecord(value)) {
        return null;
    }
    return { x: readNumber(value.x), y: readNumber(value.y) };
};

const readBrickType = (value: unknown): BrickType | null =>
    BRICK_TYPES.find((type) => type === value) ?? null;

const readBrick = (value: unknown, index: number, issues: string[]): BrickSpec | null => {
    const label = `bricks[${index}]`;
    if (!isRecord(value)) {
        issues.push(`${label} must be an object`);
        return null;
    }

    const type = readBrickType(value.type);
    const position = readVector(value.position);
    const halfSize = readVector(value.halfSize);

    if (typeof value.id !== 'string') {
        issues.push(`${label}.id must be a string`);
    }
    if (!type) {
        issues.push(`${label}.type must be one of ${BRICK_TYPES.join(', ')}`);
    }
    if (!position) {
        issues.push(`${label}.position must be an object with x and y`);
    }
    if (!halfSize) {
        issues.push(`${label}.halfSize must be an object with width and height`);
    }
    if (value.hitPoints !== undefined && typeof value.hitPoints !== 'number') {
        issues.push(`${label}.hitPoints must be a number`);
    }

    if (typeof value.id !== 'string' || !type || !position || !halfSize || !isRecord(value.halfSize)) {
        return null;
    }

    return {
        id: value.id,
        type,
        position,
        halfSize: { width: readNumber(value.halfSize.width), height: readNumber(value.halfSize.height) },
        ...(typeof value.hitPoints === 'number' ? { hitPoints: value.hitPoints } : {}),
    };
};

/**
 * @throws ConfigurationError when the value is not a `{ bricks: [...] }` layout
 */
export const parseLevelLayout = (raw: unknown, fallbackName = 'custom'): LevelLayout => {
    if (!isRecord(raw) || !Array.isArray(raw.bricks)) {
        throw new ConfigurationError(['level layout must be an object with a "bricks" array']);
    }

    const issues: string[] = [];
    const bricks: BrickSpec[] = [];
    raw.bricks.forEach((entry: unknown, index: number) => {
        const brick = readBrick(entry, index, issues);
        if (brick) {
            bricks.push(brick);
        }
    });

    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }

    return {
        name: typeof raw.name === 'string' ? raw.name : fallbackName,
        bricks,
    };
};

/**
 * @throws ConfigurationError when the file cannot be read or parsed
 */
export const loadLevelLayout = async (source: string | URL): Promise<LevelLayout> => {
    const path = typeof source === 'string' ? source : fileURLToPath(source);
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError([`cannot read level layout ${path}: ${message}`]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        throw new ConfigurationError([`level layout ${path} is not valid JSON`]);
    }

    return parseLevelLayout(parsed);
};

export const loadDefaultLayout = (): Promise<LevelLayout> => loadLevelLayout(DEFAULT_LAYOUT_URL);
