import { FixedStepLoop } from 'app/loop';
import {
    BREAKOUT_EVENT_NAMES,
    createEventBus,
    type AnomalyKind,
    type BreakoutEventBus,
    type BreakoutEventName,
    type EventEnvelope,
} from 'app/events';
import { createDefaultPaddle, createSimulation, type Simulation } from 'app/simulation';
import { mergeGameConfig } from 'config/validate';
import type { GameConfigOverrides } from 'config/game';
import type { BrickSpec } from 'physics/contracts';
import { createRandomManager, type RandomManager } from 'util/random';
import { rootLogger, type Logger } from 'util/log';

const HOST_FRAME_MS = 1000 / 60;
/** Share of the paddle half-width the autopilot may aim off-centre. */
const AIM_SPREAD = 0.7;
const AUTOPILOT_SEED_SALT = 0x9e3779b9;

export interface HeadlessSimulationOptions {
    readonly seed: number;
    readonly durationMs: number;
    readonly bricks: readonly BrickSpec[];
    readonly telemetry?: boolean;
    readonly config?: GameConfigOverrides;
    readonly logger?: Logger;
}

export interface SpeedRange {
    readonly min: number;
    readonly max: number;
}

export interface HeadlessSimulationResult {
    readonly seed: number;
    readonly durationMs: number;
    readonly ticks: number;
    readonly frames: number;
    readonly eventCounts: Record<BreakoutEventName, number>;
    readonly anomalies: Record<AnomalyKind, number>;
    /** Observed ball speed over ticks that ended with the ball in play; null if it never was. */
    readonly speed: SpeedRange | null;
    readonly levelCleared: boolean;
    readonly bricksRemaining: number;
    readonly events: readonly EventEnvelope<BreakoutEventName>[];
}

const emptyCounts = (): Record<BreakoutEventName, number> => ({
    PaddleBounce: 0,
    WallBounce: 0,
    BrickHit: 0,
    BrickDestroyed: 0,
    BallLost: 0,
    AnomalyCorrected: 0,
    BallLaunched: 0,
    LevelCleared: 0,
});

const collectEvents = (bus: BreakoutEventBus, enabled: boolean): (() => EventEnvelope<BreakoutEventName>[]) => {
    if (!enabled) {
        return () => [];
    }

    const collected: EventEnvelope<BreakoutEventName>[] = [];
    const unsubscribes = BREAKOUT_EVENT_NAMES.map((name) =>
        bus.subscribe(name, (event) => {
            collected.push(event);
        }),
    );

    return () => {
        unsubscribes.forEach((unsubscribe) => {
            unsubscribe();
        });
        return collected;
    };
};

/**
 * Paddle controller that keeps the paddle under the ball with a random aim offset, re-rolled
 * after every paddle bounce so the ball reaches the whole brick field.
 */
const createAutopilot = (simulation: Simulation, random: RandomManager) => {
    let aim = 0;
    const reroll = () => {
        const { halfWidth } = simulation.snapshot().paddle;
        aim = random.range(-AIM_SPREAD, AIM_SPREAD) * halfWidth;
    };
    reroll();

    simulation.bus.subscribe('PaddleBounce', reroll);

    return () => {
        const { ball } = simulation.snapshot();
        return {
            paddleX: ball.position.x - aim,
            launchRequested: ball.launchState === 'ready',
        };
    };
};

export const runHeadlessEngine = (options: HeadlessSimulationOptions): HeadlessSimulationResult => {
    const logger = options.logger ?? rootLogger;
    const config = mergeGameConfig(options.config ?? {});
    const bus = createEventBus({ logger: logger.child('events') });
    const simulation = createSimulation({
        config: options.config,
        paddle: createDefaultPaddle(config.playfield),
        bricks: options.bricks,
        seed: options.seed,
        bus,
        logger,
    });

    const counts = emptyCounts();
    const anomalies: Record<AnomalyKind, number> = { 'stuck-ball': 0, tunneling: 0 };
    const stopCollecting = collectEvents(bus, options.telemetry ?? false);
    const autopilot = createAutopilot(simulation, createRandomManager((options.seed ^ AUTOPILOT_SEED_SALT) >>> 0));

    let minSpeed = Number.POSITIVE_INFINITY;
    let maxSpeed = 0;

    const loop = new FixedStepLoop(() => {
        const report = simulation.step(autopilot());
        for (const event of report.events) {
            counts[event.type] += 1;
        }
        if (report.tunnelingRecovered) {
            anomalies.tunneling += 1;
        }
        if (report.stuckCorrected) {
            anomalies['stuck-ball'] += 1;
        }

        const { ball } = simulation.snapshot();
        if (ball.launchState === 'in-play') {
            minSpeed = Math.min(minSpeed, ball.speed);
            maxSpeed = Math.max(maxSpeed, ball.speed);
        }
    }, { fixedDelta: config.simulation.fixedDeltaSeconds });

    const durationMs = Math.max(0, options.durationMs);
    let frames = 0;
    while (simulation.snapshot().elapsedSeconds * 1000 < durationMs && !simulation.snapshot().levelCleared) {
        loop.advance(HOST_FRAME_MS);
        frames += 1;
    }

    const snapshot = simulation.snapshot();
    const events = stopCollecting();

    return {
        seed: options.seed,
        durationMs: snapshot.elapsedSeconds * 1000,
        ticks: snapshot.tick,
        frames,
        eventCounts: counts,
        anomalies,
        speed: maxSpeed > 0 ? { min: minSpeed, max: maxSpeed } : null,
        levelCleared: snapshot.levelCleared,
        bricksRemaining: snapshot.bricks.filter((brick) => !brick.destroyed && brick.type !== 'indestructible').length,
        events,
    };
};
