interface Size {
    readonly width: number;
    readonly height: number;
}

export interface GameConfig {
    readonly simulation: {
        /** Length of one fixed simulation tick in seconds. */
        readonly fixedDeltaSeconds: number;
    };
    readonly playfield: Size & {
        readonly wallThickness: number;
    };
    readonly ball: {
        readonly radius: number;
        readonly baseSpeed: number;
        readonly minSpeed: number;
        readonly maxSpeed: number;
        /** Half-range, in degrees, of the random spread applied around straight up at launch. */
        readonly launchAngleVariance: number;
        readonly respawnDelaySeconds: number;
    };
    readonly bounce: {
        /** Degrees from the horizontal; right-edge paddle hits leave at this angle. */
        readonly minAngle: number;
        /** Degrees from the horizontal; left-edge paddle hits leave at this angle. */
        readonly maxAngle: number;
    };
    readonly speedGovernor: {
        /** Speeds below this have no usable direction and are left to the stuck-ball watchdog. */
        readonly degenerateSpeed: number;
    };
    readonly anomaly: {
        readonly stuckSpeedThreshold: number;
        readonly stuckTimeoutSeconds: number;
        /** Speed applied by the stuck-ball correction; clamped into the governor range. */
        readonly stuckCorrectionSpeed: number;
    };
    readonly deathZone: {
        /** Distance below the paddle, before resolution scaling. */
        readonly paddleOffset: number;
        readonly horizontalOffset: number;
        readonly triggerSize: Size;
        readonly referenceResolution: Size;
        readonly minScale: number;
        readonly maxScale: number;
    };
}

/**
 * Centralized configuration for the collision core. Tunable values belong here so designers can
 * tweak behavior without hunting through the codebase.
 */
export const gameConfig = {
    simulation: { fixedDeltaSeconds: 1 / 120 },
    playfield: { width: 20, height: 12, wallThickness: 0.5 },
    ball: {
        radius: 0.25,
        baseSpeed: 8,
        minSpeed: 5,
        maxSpeed: 15,
        launchAngleVariance: 30,
        respawnDelaySeconds: 1.5,
    },
    bounce: { minAngle: 15, maxAngle: 165 },
    speedGovernor: { degenerateSpeed: 0.01 },
    anomaly: {
        stuckSpeedThreshold: 0.1,
        stuckTimeoutSeconds: 2,
        stuckCorrectionSpeed: 8,
    },
    deathZone: {
        paddleOffset: 2,
        horizontalOffset: 0,
        triggerSize: { width: 30, height: 2 },
        referenceResolution: { width: 1920, height: 1200 },
        minScale: 0.5,
        maxScale: 2,
    },
} as const satisfies GameConfig;

type DeepPartial<T> = {
    [Key in keyof T]?: T[Key] extends object ? DeepPartial<T[Key]> : T[Key];
};

export type GameConfigOverrides = DeepPartial<GameConfig>;
