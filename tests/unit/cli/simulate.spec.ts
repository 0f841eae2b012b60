import { describe, expect, it } from 'vitest';
import { createSimulateCommand, runHeadlessSimulation, type SimulationInput } from 'cli/simulate';
import { ConfigurationError } from 'app/errors';
import { createLogger } from 'util/log';

const silentLogger = createLogger('cli', { writer: () => undefined });

const runCommand = async (readStdin: () => Promise<string>) => {
    const writes: string[] = [];
    const errors: string[] = [];
    const command = createSimulateCommand({
        readStdin,
        writeStdout: async (value: string) => {
            writes.push(value);
        },
        writeStderr: async (value: string) => {
            errors.push(value);
        },
        logger: silentLogger,
    });

    const exitCode = await command.execute();
    return { exitCode, writes, errors };
};

describe('runHeadlessSimulation', () => {
    it('produces identical results for the same seed', async () => {
        const input: SimulationInput = {
            mode: 'simulate',
            seed: 21,
            durationSec: 10,
            options: { telemetry: true },
        };

        const first = await runHeadlessSimulation(input, silentLogger);
        const second = await runHeadlessSimulation(input, silentLogger);

        expect(second).toEqual(first);
    });

    it('summarises a run of the default layout', async () => {
        const result = await runHeadlessSimulation({ mode: 'simulate', seed: 3, durationSec: 10 }, silentLogger);

        expect(result.ok).toBe(true);
        expect(result.layout).toBe('default');
        expect(result.durationMs).toBeGreaterThanOrEqual(10_000);
        expect(result.eventCounts.BallLaunched).toBeGreaterThanOrEqual(1);
        expect(result.events).toBe(Object.values(result.eventCounts).reduce((sum, count) => sum + count, 0));
        expect(result.telemetry).toBeUndefined();
        expect(result.speed).not.toBeNull();
        expect(result.speed?.min).toBeGreaterThanOrEqual(5 - 1e-9);
        expect(result.speed?.max).toBeLessThanOrEqual(15 + 1e-9);
    });

    it('records every published event when telemetry is on', async () => {
        const result = await runHeadlessSimulation(
            { mode: 'simulate', seed: 5, durationSec: 5, options: { telemetry: true } },
            silentLogger,
        );

        expect(result.telemetry?.events).toHaveLength(result.events);
        expect(result.telemetry?.events[0]).toMatchObject({ type: 'BallLaunched' });
    });

    it('runs an inline layout', async () => {
        const result = await runHeadlessSimulation(
            {
                mode: 'simulate',
                seed: 9,
                durationSec: 2,
                layout: {
                    bricks: [{ id: 'solo', type: 'indestructible', position: { x: 0, y: 4 }, halfSize: { width: 1, height: 0.3 } }],
                },
            },
            silentLogger,
        );

        expect(result.layout).toBe('inline');
        expect(result.levelCleared).toBe(false);
        expect(result.bricksRemaining).toBe(0);
    });

    it('rejects a layout without bricks', async () => {
        await expect(runHeadlessSimulation({ mode: 'simulate', layout: { rows: 3 } }, silentLogger))
            .rejects.toBeInstanceOf(ConfigurationError);
    });
});

describe('createSimulateCommand', () => {
    it('writes the summary to stdout and returns zero', async () => {
        const input: SimulationInput = { mode: 'simulate', seed: 7, durationSec: 5 };

        const { exitCode, writes, errors } = await runCommand(async () => JSON.stringify(input));

        expect(exitCode).toBe(0);
        expect(errors).toEqual(['Running simulate command for seed 7.']);
        expect(writes).toHaveLength(1);
        expect(JSON.parse(writes[0])).toEqual(await runHeadlessSimulation(input, silentLogger));
    });

    it('rejects a payload that is not JSON', async () => {
        const { exitCode, writes, errors } = await runCommand(async () => '{mode');

        expect(exitCode).toBe(1);
        expect(writes).toEqual([]);
        expect(errors).toEqual(['Failed to read simulation input: invalid JSON payload']);
    });

    it('rejects a payload without the simulate mode', async () => {
        const { exitCode, errors } = await runCommand(async () => JSON.stringify({ mode: 'tune' }));

        expect(exitCode).toBe(1);
        expect(errors).toEqual(['Simulation command requires a payload with "mode": "simulate".']);
    });

    it('reports a failure to read stdin', async () => {
        const { exitCode, errors } = await runCommand(async () => {
            throw new Error('stream closed');
        });

        expect(exitCode).toBe(1);
        expect(errors).toEqual(['Failed to read simulation input: stream closed']);
    });

    it('reports a simulation that cannot start', async () => {
        const { exitCode, errors } = await runCommand(async () =>
            JSON.stringify({ mode: 'simulate', seed: 2, layout: { bricks: [] } }));

        expect(exitCode).toBe(1);
        expect(errors).toEqual([
            'Running simulate command for seed 2.',
            'Simulation failed: Invalid simulation setup: brick layout must contain at least one brick',
        ]);
    });
});
