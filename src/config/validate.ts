import { ConfigurationError } from 'app/errors';
import { isFiniteNumber } from 'util/math';
import { rootLogger, type Logger } from 'util/log';
import { gameConfig, type GameConfig, type GameConfigOverrides } from './game';

const MAX_FIXED_DELTA_SECONDS = 0.1;
const MAX_LAUNCH_VARIANCE_DEGREES = 75;

export const mergeGameConfig = (overrides: GameConfigOverrides): GameConfig => ({
    simulation: { ...gameConfig.simulation, ...overrides.simulation },
    playfield: { ...gameConfig.playfield, ...overrides.playfield },
    ball: { ...gameConfig.ball, ...overrides.ball },
    bounce: { ...gameConfig.bounce, ...overrides.bounce },
    speedGovernor: { ...gameConfig.speedGovernor, ...overrides.speedGovernor },
    anomaly: { ...gameConfig.anomaly, ...overrides.anomaly },
    deathZone: {
        ...gameConfig.deathZone,
        ...overrides.deathZone,
        triggerSize: { ...gameConfig.deathZone.triggerSize, ...overrides.deathZone?.triggerSize },
        referenceResolution: {
            ...gameConfig.deathZone.referenceResolution,
            ...overrides.deathZone?.referenceResolution,
        },
    },
});

const requirePositive = (issues: string[], label: string, value: number): void => {
    if (!isFiniteNumber(value) || value <= 0) {
        issues.push(`${label} must be a positive number (received ${String(value)})`);
    }
};

const requireNonNegative = (issues: string[], label: string, value: number): void => {
    if (!isFiniteNumber(value) || value < 0) {
        issues.push(`${label} must be zero or greater (received ${String(value)})`);
    }
};

/**
 * Lists every problem with a merged configuration; an empty list means it is usable.
 */
export const collectConfigIssues = (config: GameConfig): string[] => {
    const issues: string[] = [];
    const { simulation, playfield, ball, bounce, speedGovernor, anomaly, deathZone } = config;

    requirePositive(issues, 'simulation.fixedDeltaSeconds', simulation.fixedDeltaSeconds);
    if (isFiniteNumber(simulation.fixedDeltaSeconds) && simulation.fixedDeltaSeconds > MAX_FIXED_DELTA_SECONDS) {
        issues.push(`simulation.fixedDeltaSeconds must not exceed ${MAX_FIXED_DELTA_SECONDS}`);
    }

    requirePositive(issues, 'playfield.width', playfield.width);
    requirePositive(issues, 'playfield.height', playfield.height);
    requirePositive(issues, 'playfield.wallThickness', playfield.wallThickness);

    requirePositive(issues, 'ball.radius', ball.radius);
    requirePositive(issues, 'ball.minSpeed', ball.minSpeed);
    requirePositive(issues, 'ball.baseSpeed', ball.baseSpeed);
    requirePositive(issues, 'ball.maxSpeed', ball.maxSpeed);
    if (ball.minSpeed > ball.maxSpeed) {
        issues.push('ball.minSpeed must not exceed ball.maxSpeed');
    } else if (ball.baseSpeed < ball.minSpeed || ball.baseSpeed > ball.maxSpeed) {
        issues.push('ball.baseSpeed must lie within [ball.minSpeed, ball.maxSpeed]');
    }
    requireNonNegative(issues, 'ball.respawnDelaySeconds', ball.respawnDelaySeconds);
    requireNonNegative(issues, 'ball.launchAngleVariance', ball.launchAngleVariance);
    if (ball.launchAngleVariance >= MAX_LAUNCH_VARIANCE_DEGREES) {
        issues.push(`ball.launchAngleVariance must be below ${MAX_LAUNCH_VARIANCE_DEGREES} degrees`);
    }

    const anglesValid = isFiniteNumber(bounce.minAngle) && isFiniteNumber(bounce.maxAngle) &&
        bounce.minAngle > 0 && bounce.minAngle < 90 && bounce.maxAngle > 90 && bounce.maxAngle < 180;
    if (!anglesValid) {
        issues.push('bounce angles must satisfy 0 < minAngle < 90 < maxAngle < 180');
    }

    requirePositive(issues, 'speedGovernor.degenerateSpeed', speedGovernor.degenerateSpeed);

    requireNonNegative(issues, 'anomaly.stuckSpeedThreshold', anomaly.stuckSpeedThreshold);
    if (anomaly.stuckSpeedThreshold >= ball.minSpeed) {
        issues.push('anomaly.stuckSpeedThreshold must be below ball.minSpeed');
    }
    if (speedGovernor.degenerateSpeed > anomaly.stuckSpeedThreshold) {
        issues.push('speedGovernor.degenerateSpeed must not exceed anomaly.stuckSpeedThreshold');
    }
    requirePositive(issues, 'anomaly.stuckTimeoutSeconds', anomaly.stuckTimeoutSeconds);
    requirePositive(issues, 'anomaly.stuckCorrectionSpeed', anomaly.stuckCorrectionSpeed);

    requireNonNegative(issues, 'deathZone.paddleOffset', deathZone.paddleOffset);
    if (!isFiniteNumber(deathZone.horizontalOffset)) {
        issues.push('deathZone.horizontalOffset must be a finite number');
    }
    requirePositive(issues, 'deathZone.triggerSize.width', deathZone.triggerSize.width);
    requirePositive(issues, 'deathZone.triggerSize.height', deathZone.triggerSize.height);
    requirePositive(issues, 'deathZone.referenceResolution.width', deathZone.referenceResolution.width);
    requirePositive(issues, 'deathZone.referenceResolution.height', deathZone.referenceResolution.height);
    requirePositive(issues, 'deathZone.minScale', deathZone.minScale);
    if (deathZone.maxScale < deathZone.minScale) {
        issues.push('deathZone.maxScale must not be below deathZone.minScale');
    }

    return issues;
};

/**
 * Merge overrides onto the defaults and validate the result once, at startup.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export const resolveGameConfig = (
    overrides: GameConfigOverrides = {},
    logger: Logger = rootLogger.child('config'),
): GameConfig => {
    const config = mergeGameConfig(overrides);
    const issues = collectConfigIssues(config);

    if (issues.length > 0) {
        logger.error('Rejected simulation configuration', { issues });
        throw new ConfigurationError(issues);
    }

    return config;
};
