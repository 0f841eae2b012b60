import { runHeadlessSimulation, createSimulateCommand, type SimulationInput } from './simulate';
import { createLogger, formatLogEntry, type LogLevel, type Logger } from 'util/log';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export interface CliOptions {
    readonly argv?: readonly string[];
    readonly logger?: Logger;
    readonly readStdin?: () => Promise<string>;
}

interface ParsedSimulateOptions {
    seed?: number;
    durationSec?: number;
    layoutPath?: string;
    telemetry?: boolean;
    logLevel?: LogLevel;
}

export const USAGE = 'Usage: breakout-sim <simulate|run> [--seed n] [--duration seconds] [--telemetry] [--layout file.json] [--verbose]';

const parseSimulateArgs = (args: readonly string[]): ParsedSimulateOptions => {
    const options: ParsedSimulateOptions = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--seed' && i + 1 < args.length) {
            options.seed = parseInt(args[i + 1], 10);
            i++;
        } else if (arg === '--duration' && i + 1 < args.length) {
            options.durationSec = parseFloat(args[i + 1]);
            i++;
        } else if (arg === '--layout' && i + 1 < args.length) {
            options.layoutPath = args[i + 1];
            i++;
        } else if (arg === '--telemetry') {
            options.telemetry = true;
        } else if (arg === '--verbose') {
            options.logLevel = 'info';
        }
    }
    return options;
};

/**
 * Diagnostics go to stderr so stdout carries only the JSON summary.
 */
const createStderrLogger = (minLevel: LogLevel): Logger =>
    createLogger('breakout', {
        minLevel,
        writer: (entry) => {
            process.stderr.write(`${formatLogEntry(entry)}\n`);
        },
    });

const readProcessStdin = async (): Promise<string> => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
};

export function createCli(options: CliOptions = {}): CliCommand {
    const execute = async (): Promise<number> => {
        const args = options.argv ?? process.argv.slice(2);
        if (args.length === 0) {
            console.error(USAGE);
            return 1;
        }

        const command = args[0];
        const restArgs = args.slice(1);

        if (command === 'simulate') {
            const { telemetry, layoutPath, logLevel, ...rest } = parseSimulateArgs(restArgs);
            const logger = options.logger ?? createStderrLogger(logLevel ?? 'warn');
            const input = {
                mode: 'simulate' as const,
                ...rest,
                ...(telemetry ? { options: { telemetry: true } } : {}),
                ...(layoutPath ? { layoutPath } : {}),
            } satisfies SimulationInput;

            try {
                const result = await runHeadlessSimulation(input, logger);
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${error instanceof Error ? error.message : String(error)}`);
                return 1;
            }
        }

        if (command === 'run') {
            const simulate = createSimulateCommand({
                readStdin: options.readStdin ?? readProcessStdin,
                writeStdout: async (output) => {
                    console.log(output);
                },
                writeStderr: (message) => {
                    console.error(message);
                },
                logger: options.logger ?? createStderrLogger('warn'),
            });
            return simulate.execute();
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
