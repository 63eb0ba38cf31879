import { gameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import type { GameSnapshot } from './session';
import type { InputEvent, InputResult } from './state-machine';
import type { StepReport } from './stepper';

export const DEFAULT_FRAME_RATE = gameConfig.simulation.frameRate;

/** Schedules `callback` after `delayMs` and returns a function that cancels it. */
export type FrameScheduler = (callback: () => void, delayMs: number) => () => void;

const FALLBACK_SCHEDULER: FrameScheduler = (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    return () => {
        clearTimeout(timer);
    };
};

const resolveNow = (): (() => number) => {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return () => performance.now();
    }

    return () => Date.now();
};

export interface FrameLoopRuntime {
    handleInput(event: InputEvent): InputResult;
    advance(realDeltaSeconds: number): StepReport;
    snapshot(): GameSnapshot;
}

export type RenderCallback = (snapshot: GameSnapshot) => void;

export interface FrameLoopOptions {
    readonly frameRate?: number;
    /** Stop after this many frames; unbounded when omitted */
    readonly maxFrames?: number;
    readonly now?: () => number;
    readonly schedule?: FrameScheduler;
    readonly logger?: Logger;
}

export type LoopExitReason = 'quit' | 'stopped';

export interface LoopExit {
    readonly reason: LoopExitReason;
    readonly frames: number;
}

export interface FrameLoop {
    /** Queue an input event for the next frame. */
    enqueue(event: InputEvent): void;
    run(): Promise<LoopExit>;
    stop(): void;
    isRunning(): boolean;
}

/**
 * Drives one runtime frame by frame: queued input first, then the simulation,
 * then the render callback, then a yield to the scheduler until the next
 * frame is due.
 */
export const createFrameLoop = (
    runtime: FrameLoopRuntime,
    render: RenderCallback,
    options: FrameLoopOptions = {},
): FrameLoop => {
    const configuredRate = options.frameRate ?? DEFAULT_FRAME_RATE;
    const frameRate = Number.isFinite(configuredRate) && configuredRate > 0 ? configuredRate : DEFAULT_FRAME_RATE;
    const frameIntervalMs = 1000 / frameRate;
    const maxFrames = options.maxFrames ?? Number.POSITIVE_INFINITY;
    const now = options.now ?? resolveNow();
    const schedule = options.schedule ?? FALLBACK_SCHEDULER;
    const logger = options.logger ?? rootLogger.child('runtime:loop');

    const queue: InputEvent[] = [];
    let running = false;
    let frames = 0;
    let lastTime = 0;
    let cancelPending: (() => void) | undefined;
    let settle: ((exit: LoopExit) => void) | undefined;
    let fail: ((error: unknown) => void) | undefined;

    const finish = (reason: LoopExitReason) => {
        running = false;
        cancelPending?.();
        cancelPending = undefined;
        const resolve = settle;
        settle = undefined;
        fail = undefined;
        logger.info('Frame loop finished', { reason, frames });
        resolve?.({ reason, frames });
    };

    const abort = (error: unknown) => {
        running = false;
        cancelPending?.();
        cancelPending = undefined;
        const reject = fail;
        settle = undefined;
        fail = undefined;
        logger.error('Frame loop aborted', { frames, error: error instanceof Error ? error.message : String(error) });
        reject?.(error);
    };

    const drainInput = (): boolean => {
        while (queue.length > 0) {
            const event = queue.shift();
            if (event && runtime.handleInput(event) === 'quit') {
                queue.length = 0;
                return true;
            }
        }
        return false;
    };

    const runFrame = (frameStart: number): boolean => {
        const deltaMs = Math.max(0, frameStart - lastTime);
        lastTime = frameStart;

        const quit = drainInput();
        runtime.advance(deltaMs / 1000);
        frames += 1;
        render(runtime.snapshot());
        return quit;
    };

    const frame = () => {
        cancelPending = undefined;
        if (!running) {
            return;
        }

        const frameStart = now();
        let quit: boolean;
        try {
            quit = runFrame(frameStart);
        } catch (error) {
            abort(error);
            return;
        }

        // stop() may have been called from the render callback
        if (!running) {
            return;
        }

        if (quit) {
            finish('quit');
            return;
        }

        if (frames >= maxFrames) {
            finish('stopped');
            return;
        }

        const elapsed = now() - frameStart;
        cancelPending = schedule(frame, Math.max(0, frameIntervalMs - elapsed));
    };

    const run: FrameLoop['run'] = () => {
        if (running) {
            return Promise.reject(new Error('Frame loop is already running'));
        }

        running = true;
        frames = 0;
        lastTime = now();
        logger.debug('Frame loop started', { frameRate });

        return new Promise<LoopExit>((resolve, reject) => {
            settle = resolve;
            fail = reject;
            frame();
        });
    };

    const stop: FrameLoop['stop'] = () => {
        if (!running) {
            return;
        }
        finish('stopped');
    };

    return {
        enqueue: (event) => {
            queue.push(event);
        },
        run,
        stop,
        isRunning: () => running,
    };
};
