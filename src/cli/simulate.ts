import { resolve as resolvePath } from 'node:path';
import type { BreakoutEventName, EventEnvelope } from 'app/events';
import { loadDefaultLayout, loadLevelLayout, parseLevelLayout, type LevelLayout } from 'util/levels';
import { isFiniteNumber } from 'util/math';
import type { Logger } from 'util/log';
import { runHeadlessEngine, type HeadlessSimulationResult } from './headless-engine';

export interface SimulateCommandIO {
    readonly readStdin: () => Promise<string>;
    readonly writeStdout: (output: string) => Promise<void>;
    readonly writeStderr?: (message: string) => Promise<void> | void;
    readonly logger?: Logger;
}

export interface SimulationOptions {
    readonly telemetry?: boolean;
}

export interface SimulationInput {
    readonly mode: 'simulate';
    readonly seed?: number;
    readonly durationSec?: number;
    readonly options?: SimulationOptions;
    /** Path of a JSON `{ bricks: [...] }` layout, relative to the working directory. */
    readonly layoutPath?: string;
    /** Inline layout; takes precedence over `layoutPath`. */
    readonly layout?: unknown;
}

export interface SimulationResult {
    readonly ok: true;
    readonly seed: number;
    readonly layout: string;
    readonly durationMs: number;
    readonly ticks: number;
    readonly frames: number;
    readonly events: number;
    readonly eventCounts: HeadlessSimulationResult['eventCounts'];
    readonly anomalies: HeadlessSimulationResult['anomalies'];
    readonly speed: HeadlessSimulationResult['speed'];
    readonly levelCleared: boolean;
    readonly bricksRemaining: number;
    readonly telemetry?: {
        readonly events: readonly EventEnvelope<BreakoutEventName>[];
    };
}

const DEFAULT_SEED = 1;
const DEFAULT_DURATION_SEC = 180;

const resolveLayout = async (input: SimulationInput): Promise<LevelLayout> => {
    if (input.layout !== undefined) {
        return parseLevelLayout(input.layout, 'inline');
    }

    if (input.layoutPath) {
        return loadLevelLayout(resolvePath(process.cwd(), input.layoutPath));
    }

    return loadDefaultLayout();
};

const totalEvents = (counts: HeadlessSimulationResult['eventCounts']): number =>
    Object.values(counts).reduce((sum, count) => sum + count, 0);

const mapResult = (
    source: HeadlessSimulationResult,
    layout: LevelLayout,
    telemetryRequested: boolean,
): SimulationResult => ({
    ok: true,
    seed: source.seed,
    layout: layout.name,
    durationMs: source.durationMs,
    ticks: source.ticks,
    frames: source.frames,
    events: totalEvents(source.eventCounts),
    eventCounts: source.eventCounts,
    anomalies: source.anomalies,
    speed: source.speed,
    levelCleared: source.levelCleared,
    bricksRemaining: source.bricksRemaining,
    telemetry: telemetryRequested
        ? {
            events: source.events,
        }
        : undefined,
});

/**
 * @throws ConfigurationError when the layout cannot be loaded or the simulation refuses it
 */
export const runHeadlessSimulation = async (
    input: SimulationInput,
    logger?: Logger,
): Promise<SimulationResult> => {
    const seed = isFiniteNumber(input.seed) ? input.seed : DEFAULT_SEED;
    const durationSec = isFiniteNumber(input.durationSec) ? Math.max(1, input.durationSec) : DEFAULT_DURATION_SEC;
    const telemetryRequested = input.options?.telemetry ?? false;
    const layout = await resolveLayout(input);

    const result = runHeadlessEngine({
        seed,
        durationMs: durationSec * 1000,
        bricks: layout.bricks,
        telemetry: telemetryRequested,
        logger,
    });

    return mapResult(result, layout, telemetryRequested);
};

const logToStderr = async (io: SimulateCommandIO, message: string) => {
    await io.writeStderr?.(message);
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isSimulationInput = (value: unknown): value is SimulationInput =>
    typeof value === 'object' && value !== null && 'mode' in value && value.mode === 'simulate';

export interface SimulateCommand {
    readonly execute: () => Promise<number>;
}

/**
 * Runs a simulation described by a JSON payload on stdin and writes the summary to stdout.
 */
export const createSimulateCommand = (io: SimulateCommandIO): SimulateCommand => {
    const execute = async (): Promise<number> => {
        let raw: string;

        try {
            raw = await io.readStdin();
        } catch (error) {
            await logToStderr(io, `Failed to read simulation input: ${describeError(error)}`);
            return 1;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            await logToStderr(io, 'Failed to read simulation input: invalid JSON payload');
            return 1;
        }

        if (!isSimulationInput(parsed)) {
            await logToStderr(io, 'Simulation command requires a payload with "mode": "simulate".');
            return 1;
        }

        await logToStderr(io, `Running simulate command for seed ${parsed.seed ?? DEFAULT_SEED}.`);

        try {
            const result = await runHeadlessSimulation(parsed, io.logger);
            await io.writeStdout(JSON.stringify(result));
            return 0;
        } catch (error) {
            await logToStderr(io, `Simulation failed: ${describeError(error)}`);
            return 1;
        }
    };

    return {
        execute,
    };
};
