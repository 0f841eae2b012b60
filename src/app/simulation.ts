/**
 * Simulation aggregate
 *
 * Holds every piece of per-level state (ball, paddle, bricks, walls, death zone, watchdog) and
 * advances it one fixed tick at a time. Collaborators read snapshots and subscribe to the event
 * bus; they never mutate the state directly.
 */

import { Vector } from 'physics/matter';
import { AnomalyValidator } from 'physics/anomaly-validator';
import { BallLaunchController } from 'physics/ball-launch';
import { createDefaultWalls, DeathZoneTrigger } from 'physics/boundaries';
import { BrickDestructionCoordinator, collectBrickIssues } from 'physics/brick-coordinator';
import { detectContacts, type BallSample, type CollisionScene } from 'physics/collision-detection';
import { CollisionRouter, type RouteSummary } from 'physics/collision-router';
import {
    createBrickHandler,
    createDeathZoneHandler,
    createPaddleHandler,
    createWallHandler,
    type BallBody,
    type ContactEnvironment,
} from 'physics/contact-handlers';
import type {
    BallState,
    BoundaryWall,
    BrickSnapshot,
    BrickSpec,
    DeathZoneRegion,
    PaddleSpec,
} from 'physics/contracts';
import { collectPaddleIssues, collectWallIssues } from 'physics/setup-validation';
import { collectConfigIssues, mergeGameConfig } from 'config/validate';
import type { GameConfig, GameConfigOverrides } from 'config/game';
import { governVelocity, type SpeedLimits } from 'util/speed-regulation';
import { createRandomManager, type RandomManager } from 'util/random';
import { clamp, isFiniteNumber } from 'util/math';
import { rootLogger, type Logger } from 'util/log';
import type { TickInput, Vector2, Viewport } from 'types/input';
import { ConfigurationError } from './errors';
import {
    createEventBus,
    type BreakoutEventBus,
    type BreakoutEventName,
    type EventEnvelope,
    type EventSink,
} from './events';

const RESPAWN_EPSILON = 1e-9;
const DEFAULT_PADDLE_HALF_WIDTH = 1.5;
const DEFAULT_PADDLE_HALF_HEIGHT = 0.25;
const DEFAULT_PADDLE_FLOOR_GAP = 1;

export interface SimulationOptions {
    readonly config?: GameConfigOverrides;
    readonly paddle?: PaddleSpec | null;
    readonly bricks: readonly BrickSpec[];
    /** Defaults to top, left and right walls around the configured playfield. */
    readonly walls?: readonly BoundaryWall[];
    readonly viewport?: Viewport;
    /** Seed for launch directions; the same seed replays the same session. */
    readonly seed?: number;
    readonly bus?: BreakoutEventBus;
    readonly logger?: Logger;
}

export interface LevelDefinition {
    readonly bricks: readonly BrickSpec[];
    readonly walls?: readonly BoundaryWall[];
}

export interface TickReport {
    readonly tick: number;
    readonly events: readonly EventEnvelope<BreakoutEventName>[];
    readonly route: RouteSummary;
    readonly tunnelingRecovered: boolean;
    readonly stuckCorrected: boolean;
}

export interface BallSnapshot extends BallState {
    readonly speed: number;
}

export interface SimulationSnapshot {
    readonly tick: number;
    readonly elapsedSeconds: number;
    readonly ball: BallSnapshot;
    readonly paddle: PaddleSpec;
    readonly bricks: readonly BrickSnapshot[];
    readonly walls: readonly BoundaryWall[];
    readonly deathZone: DeathZoneRegion;
    readonly levelCleared: boolean;
    /** Seconds until a lost ball returns to the paddle, or null when no respawn is pending. */
    readonly respawnInSeconds: number | null;
}

export interface BallPlacement {
    readonly position: Vector2;
    readonly velocity: Vector2;
}

interface PendingEvent {
    readonly envelope: EventEnvelope<BreakoutEventName>;
    readonly deliver: () => void;
}

const EMPTY_ROUTE: RouteSummary = { dispatched: 0, dropped: 0, unhandled: 0 };

/**
 * Paddle centred near the bottom of the playfield, free to move across its full width.
 */
export const createDefaultPaddle = (playfield: GameConfig['playfield']): PaddleSpec => ({
    x: 0,
    y: -playfield.height / 2 + DEFAULT_PADDLE_FLOOR_GAP,
    halfWidth: DEFAULT_PADDLE_HALF_WIDTH,
    halfHeight: DEFAULT_PADDLE_HALF_HEIGHT,
    bounds: { minX: -playfield.width / 2, maxX: playfield.width / 2 },
});

export class Simulation {
    readonly config: GameConfig;

    readonly bus: BreakoutEventBus;

    private readonly logger: Logger;

    private readonly limits: SpeedLimits;

    private readonly random: RandomManager;

    private readonly ball: BallBody;

    private readonly launcher: BallLaunchController;

    private readonly validator: AnomalyValidator;

    private readonly router: CollisionRouter;

    private readonly deathZone: DeathZoneTrigger;

    private paddle: PaddleSpec;

    private walls: readonly BoundaryWall[];

    private wallsById = new Map<string, BoundaryWall>();

    private bricks: BrickDestructionCoordinator;

    private viewport: Viewport | undefined;

    private tick = 0;

    private tickTimestamp = 0;

    private respawnTimer: number | null = null;

    private levelCleared = false;

    private pending: PendingEvent[] = [];

    /**
     * @throws ConfigurationError naming every missing or invalid dependency
     */
    constructor(options: SimulationOptions) {
        const baseLogger = options.logger ?? rootLogger;
        this.logger = baseLogger.child('simulation');

        const config = mergeGameConfig(options.config ?? {});
        const walls = options.walls ?? createDefaultWalls(config.playfield);
        const paddle = options.paddle;
        const issues = [
            ...collectConfigIssues(config),
            ...collectPaddleIssues(paddle),
            ...collectBrickIssues(options.bricks),
            ...collectWallIssues(walls),
        ];

        if (!paddle || issues.length > 0) {
            this.logger.error('Simulation cannot start', { issues });
            throw new ConfigurationError(issues);
        }

        this.config = config;
        this.bus = options.bus ?? createEventBus({ logger: baseLogger.child('events') });
        this.limits = {
            minSpeed: config.ball.minSpeed,
            maxSpeed: config.ball.maxSpeed,
            degenerateSpeed: config.speedGovernor.degenerateSpeed,
        };
        this.random = createRandomManager(options.seed);
        this.paddle = this.clampPaddle(paddle, paddle.x);
        this.walls = walls;
        this.indexWalls();
        this.bricks = new BrickDestructionCoordinator(options.bricks);
        this.viewport = options.viewport;

        this.ball = {
            position: this.restingBallPosition(),
            velocity: { x: 0, y: 0 },
            radius: config.ball.radius,
            collisionCount: 0,
        };
        this.launcher = new BallLaunchController({
            baseSpeed: config.ball.baseSpeed,
            launchAngleVariance: config.ball.launchAngleVariance,
            random: this.random.random,
        });
        this.validator = new AnomalyValidator({
            stuckSpeedThreshold: config.anomaly.stuckSpeedThreshold,
            stuckTimeoutSeconds: config.anomaly.stuckTimeoutSeconds,
            stuckCorrectionSpeed: config.anomaly.stuckCorrectionSpeed,
            limits: this.limits,
            logger: baseLogger.child('anomaly'),
        });
        this.deathZone = new DeathZoneTrigger(config.deathZone, config.playfield, this.paddle, this.viewport);
        this.router = new CollisionRouter(this.validator, baseLogger.child('collision-router'));
        this.registerHandlers();

        this.logger.info('Simulation ready', {
            seed: this.random.seed(),
            bricks: options.bricks.length,
            walls: walls.length,
        });
    }

    /**
     * Advance one fixed tick. Events raised during the tick are published after the tick's
     * state is final, stamped with the simulated time.
     */
    step(input: TickInput = {}): TickReport {
        const deltaSeconds = this.config.simulation.fixedDeltaSeconds;
        this.tick += 1;
        this.tickTimestamp = this.tick * deltaSeconds * 1000;

        this.applyPaddleInput(input.paddleX);
        this.deathZone.reposition(this.paddle);

        if (this.launcher.state() === 'ready') {
            this.ball.position = this.restingBallPosition();
            if (input.launchRequested) {
                this.launchBall();
            }
        }

        let route = EMPTY_ROUTE;
        let tunnelingRecovered = false;
        let stuckCorrected = false;

        if (this.launcher.state() === 'in-play') {
            const previousPosition = this.ball.position;
            this.ball.position = Vector.add(previousPosition, Vector.mult(this.ball.velocity, deltaSeconds));

            const scene = this.scene();
            const sample = this.sample(previousPosition);
            let contacts = detectContacts(sample, scene, this.tick);

            const recovery = this.validator.recoverTunneling(
                {
                    start: previousPosition,
                    end: this.ball.position,
                    radius: this.ball.radius,
                    velocity: this.ball.velocity,
                },
                scene,
                new Set(contacts.map((event) => event.colliderId)),
                this.tick,
            );

            if (recovery) {
                tunnelingRecovered = true;
                this.ball.position = recovery.position;
                this.emit('AnomalyCorrected', { kind: 'tunneling', position: recovery.position });
                contacts = [
                    recovery.event,
                    ...detectContacts(this.sample(previousPosition), scene, this.tick, new Set([recovery.event.colliderId])),
                ];
            }

            route = this.router.route(contacts, previousPosition);
            this.deathZone.refresh(this.ball.position);

            const correction = this.validator.checkStuck(this.ball.velocity, deltaSeconds);
            if (correction) {
                stuckCorrected = true;
                this.ball.velocity = governVelocity(correction.velocity, this.limits);
                this.emit('AnomalyCorrected', {
                    kind: 'stuck-ball',
                    position: { x: this.ball.position.x, y: this.ball.position.y },
                });
            }

            this.ball.velocity = governVelocity(this.ball.velocity, this.limits);
        }

        this.advanceRespawn(deltaSeconds);

        const events = this.flush();
        return {
            tick: this.tick,
            events,
            route,
            tunnelingRecovered,
            stuckCorrected,
        };
    }

    /**
     * Return the ball to the paddle in the ready state. Applied between ticks.
     */
    resetBall(): void {
        if (this.launcher.state() !== 'ready') {
            this.launcher.reset();
        }
        this.ball.position = this.restingBallPosition();
        this.ball.velocity = { x: 0, y: 0 };
        this.ball.collisionCount = 0;
        this.respawnTimer = null;
        this.validator.reset();
        this.deathZone.rearm();
    }

    /**
     * Replace the brick set (and optionally the walls) and reset the ball. Applied between ticks.
     *
     * @throws ConfigurationError when the layout is invalid; the current level is kept
     */
    loadLevel(level: LevelDefinition): void {
        const walls = level.walls ?? this.walls;
        const issues = [...collectBrickIssues(level.bricks), ...collectWallIssues(walls)];
        if (issues.length > 0) {
            this.logger.error('Rejected level', { issues });
            throw new ConfigurationError(issues);
        }

        this.bricks = new BrickDestructionCoordinator(level.bricks);
        this.walls = walls;
        this.indexWalls();
        this.levelCleared = false;
        this.resetBall();

        this.logger.info('Level loaded', { bricks: level.bricks.length, walls: walls.length });
    }

    /**
     * Put the ball in play at a given state, bypassing the launch. Applied between ticks; meant
     * for tooling and scripted scenarios.
     */
    placeBall(placement: BallPlacement): void {
        this.launcher.forceInPlay();
        this.ball.position = { x: placement.position.x, y: placement.position.y };
        this.ball.velocity = { x: placement.velocity.x, y: placement.velocity.y };
        this.respawnTimer = null;
        this.validator.reset();
        this.deathZone.rearm();
    }

    setViewport(viewport: Viewport | undefined): void {
        this.viewport = viewport;
        this.deathZone.setViewport(viewport, this.paddle);
    }

    snapshot(): SimulationSnapshot {
        return {
            tick: this.tick,
            elapsedSeconds: this.tick * this.config.simulation.fixedDeltaSeconds,
            ball: {
                position: { x: this.ball.position.x, y: this.ball.position.y },
                velocity: { x: this.ball.velocity.x, y: this.ball.velocity.y },
                radius: this.ball.radius,
                launchState: this.launcher.state(),
                collisionCount: this.ball.collisionCount,
                speed: Vector.magnitude(this.ball.velocity),
            },
            paddle: this.paddle,
            bricks: this.bricks.allBricks(),
            walls: this.walls,
            deathZone: this.deathZone.region(),
            levelCleared: this.levelCleared,
            respawnInSeconds: this.respawnTimer,
        };
    }

    private readonly emit: EventSink = (type, payload) => {
        const timestamp = this.tickTimestamp;
        this.pending.push({
            envelope: { type, payload, timestamp },
            deliver: () => this.bus.publish(type, payload, timestamp),
        });
    };

    private flush(): EventEnvelope<BreakoutEventName>[] {
        const batch = this.pending;
        this.pending = [];
        for (const event of batch) {
            event.deliver();
        }
        return batch.map((event) => event.envelope);
    }

    private registerHandlers(): void {
        const env: ContactEnvironment = { ball: this.ball, limits: this.limits, emit: this.emit };

        this.router.register('ball', 'boundary', createWallHandler(env, (id) => this.wallsById.get(id)));
        this.router.register('ball', 'paddle', createPaddleHandler(env, () => this.paddle, this.config.bounce));
        this.router.register('ball', 'brick', createBrickHandler(env, () => this.bricks, () => this.handleLevelCleared()));
        this.router.register('ball', 'death-zone', createDeathZoneHandler(env, this.deathZone, () => this.handleBallLost()));
    }

    private launchBall(): void {
        const launch = this.launcher.launch();
        this.ball.velocity = governVelocity(launch.velocity, this.limits);
        this.ball.collisionCount = 0;
        this.validator.reset();

        this.emit('BallLaunched', {
            position: { x: this.ball.position.x, y: this.ball.position.y },
            direction: launch.direction,
            speed: Vector.magnitude(this.ball.velocity),
        });
        this.logger.debug('Ball launched', { tick: this.tick, angle: launch.angle });
    }

    private handleBallLost(): void {
        this.logger.info('Ball lost', { tick: this.tick });
        if (this.respawnTimer === null) {
            this.respawnTimer = this.config.ball.respawnDelaySeconds;
        }
    }

    private handleLevelCleared(): void {
        if (this.levelCleared) {
            return;
        }

        this.levelCleared = true;
        this.emit('LevelCleared', { tick: this.tick });
        this.logger.info('Level cleared', { tick: this.tick });
    }

    private advanceRespawn(deltaSeconds: number): void {
        if (this.respawnTimer === null) {
            return;
        }

        this.respawnTimer -= deltaSeconds;
        if (this.respawnTimer <= RESPAWN_EPSILON) {
            this.resetBall();
        }
    }

    private applyPaddleInput(paddleX: number | undefined): void {
        if (paddleX === undefined) {
            return;
        }

        if (!isFiniteNumber(paddleX)) {
            this.logger.debug('Ignored non-finite paddle position', { tick: this.tick });
            return;
        }

        this.paddle = this.clampPaddle(this.paddle, paddleX);
    }

    private clampPaddle(paddle: PaddleSpec, x: number): PaddleSpec {
        const minX = paddle.bounds.minX + paddle.halfWidth;
        const maxX = paddle.bounds.maxX - paddle.halfWidth;
        return { ...paddle, x: clamp(x, minX, maxX) };
    }

    private restingBallPosition(): Vector2 {
        return {
            x: this.paddle.x,
            y: this.paddle.y + this.paddle.halfHeight + this.config.ball.radius,
        };
    }

    private indexWalls(): void {
        this.wallsById = new Map(this.walls.map((wall) => [wall.id, wall]));
    }

    private scene(): CollisionScene {
        return {
            walls: this.walls,
            paddle: this.paddle,
            bricks: this.bricks.activeBricks(),
            deathZone: this.deathZone.region(),
        };
    }

    private sample(previousPosition: Vector2): BallSample {
        return {
            position: this.ball.position,
            previousPosition,
            velocity: this.ball.velocity,
            radius: this.ball.radius,
        };
    }
}

export const createSimulation = (options: SimulationOptions): Simulation => new Simulation(options);
