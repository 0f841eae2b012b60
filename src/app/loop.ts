export const DEFAULT_FIXED_DELTA = 1 / 120;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
}

export type UpdateCallback = (deltaSeconds: number) => void;

export interface FrameResult {
    /** Fixed ticks run for this frame. */
    readonly steps: number;
    /** Leftover fraction of a tick still in the accumulator, in [0, 1]. */
    readonly alpha: number;
}

/**
 * Turns variable frame times into whole fixed ticks. The host (a render loop, a test, the CLI)
 * reports elapsed frame time; the loop decides how many ticks to run.
 */
export class FixedStepLoop {
    private readonly fixedDelta: number;

    private readonly stepMs: number;

    private readonly maxStepsPerFrame: number;

    private readonly maxFrameDeltaMs: number;

    private accumulatorMs = 0;

    private totalSteps = 0;

    constructor(
        private readonly update: UpdateCallback,
        options: LoopOptions = {},
    ) {
        const configuredDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.fixedDelta = configuredDelta > 0 ? configuredDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.fixedDelta * 1000;
        const maxSteps = options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME;
        this.maxStepsPerFrame = Math.max(1, Math.floor(maxSteps));
        const frameClamp = options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS;
        // Frame clamp never falls below a single step.
        this.maxFrameDeltaMs = Math.max(this.stepMs, frameClamp);
    }

    advance(frameDeltaMs: number): FrameResult {
        let deltaMs = Number.isFinite(frameDeltaMs) ? frameDeltaMs : 0;
        if (deltaMs < 0) {
            deltaMs = 0;
        }
        if (deltaMs > this.maxFrameDeltaMs) {
            deltaMs = this.maxFrameDeltaMs;
        }

        this.accumulatorMs += deltaMs;

        let steps = 0;
        while (this.accumulatorMs >= this.stepMs && steps < this.maxStepsPerFrame) {
            this.update(this.fixedDelta);
            this.accumulatorMs -= this.stepMs;
            steps += 1;
        }

        if (steps === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
            // Drop the backlog instead of spiralling when the step cap is hit.
            this.accumulatorMs = this.stepMs;
        }

        this.totalSteps += steps;
        return { steps, alpha: Math.min(1, this.accumulatorMs / this.stepMs) };
    }

    reset(): void {
        this.accumulatorMs = 0;
    }

    stepCount(): number {
        return this.totalSteps;
    }

    getFixedDelta(): number {
        return this.fixedDelta;
    }
}
