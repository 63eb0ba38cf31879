import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFrameLoop, type FrameLoopRuntime, type FrameScheduler } from 'app/loop';
import type { GameSnapshot } from 'app/session';
import type { InputEvent } from 'app/state-machine';
import { silentLogger } from './fakes';

const SNAPSHOT: GameSnapshot = {
    sessionId: 'test-session',
    phase: 'play',
    score: 0,
    lives: 2,
    level: 1,
    gameOver: false,
    pelletsRemaining: 0,
    player: { id: 'player', position: { x: 0, y: 0 }, direction: 'left', nextDirection: null, active: true },
    pursuers: [],
    tiles: [],
};

interface ScheduledFrame {
    readonly callback: () => void;
    readonly delayMs: number;
    cancelled: boolean;
}

const createFakeScheduler = () => {
    const pending: ScheduledFrame[] = [];

    const schedule: FrameScheduler = (callback, delayMs) => {
        const entry: ScheduledFrame = { callback, delayMs, cancelled: false };
        pending.push(entry);
        return () => {
            entry.cancelled = true;
        };
    };

    return {
        schedule,
        pending,
        flush: () => {
            const entry = pending.shift();
            if (entry && !entry.cancelled) {
                entry.callback();
            }
        },
    };
};

const createRecordingRuntime = (log: string[]): FrameLoopRuntime => ({
    handleInput: (event: InputEvent) => {
        log.push(`input:${event.type}`);
        return event.type === 'quit' || event.type === 'cancel' ? 'quit' : 'continue';
    },
    advance: (seconds) => {
        log.push(`advance:${seconds}`);
        return { ticks: 0, outcome: 'idle' };
    },
    snapshot: () => SNAPSHOT,
});

describe('createFrameLoop', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('handles input, then advances, then renders, every frame', () => {
        let time = 0;
        const log: string[] = [];
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(createRecordingRuntime(log), () => log.push('render'), {
            now: () => time,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        loop.enqueue({ type: 'confirm' });
        loop.enqueue({ type: 'direction', direction: 'up' });
        void loop.run();

        expect(log).toEqual(['input:confirm', 'input:direction', 'advance:0', 'render']);

        time = 20;
        scheduler.flush();

        expect(log.slice(4)).toEqual(['advance:0.02', 'render']);
        loop.stop();
    });

    it('waits one frame interval between frames', () => {
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(createRecordingRuntime([]), () => undefined, {
            frameRate: 50,
            now: () => 0,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        void loop.run();

        expect(scheduler.pending[0].delayMs).toBe(20);
        loop.stop();
    });

    it('ends after rendering the frame in which quit was requested, dropping input queued behind it', async () => {
        const log: string[] = [];
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(createRecordingRuntime(log), () => log.push('render'), {
            now: () => 0,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        loop.enqueue({ type: 'quit' });
        loop.enqueue({ type: 'confirm' });

        await expect(loop.run()).resolves.toEqual({ reason: 'quit', frames: 1 });
        expect(log).toEqual(['input:quit', 'advance:0', 'render']);
        expect(scheduler.pending).toHaveLength(0);
        expect(loop.isRunning()).toBe(false);
    });

    it('stops after the configured number of frames', async () => {
        const scheduler = createFakeScheduler();
        const renders = vi.fn();
        const loop = createFrameLoop(createRecordingRuntime([]), renders, {
            maxFrames: 3,
            now: () => 0,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        const exit = loop.run();
        scheduler.flush();
        scheduler.flush();

        await expect(exit).resolves.toEqual({ reason: 'stopped', frames: 3 });
        expect(renders).toHaveBeenCalledTimes(3);
        expect(renders).toHaveBeenCalledWith(SNAPSHOT);
    });

    it('cancels the pending frame when stopped', async () => {
        const scheduler = createFakeScheduler();
        const renders = vi.fn();
        const loop = createFrameLoop(createRecordingRuntime([]), renders, {
            now: () => 0,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        const exit = loop.run();
        loop.stop();
        scheduler.flush();

        await expect(exit).resolves.toEqual({ reason: 'stopped', frames: 1 });
        expect(renders).toHaveBeenCalledTimes(1);
    });

    it('can be stopped from the render callback', async () => {
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(
            createRecordingRuntime([]),
            () => {
                loop.stop();
            },
            { now: () => 0, schedule: scheduler.schedule, logger: silentLogger },
        );

        await expect(loop.run()).resolves.toEqual({ reason: 'stopped', frames: 1 });
        expect(scheduler.pending).toHaveLength(0);
    });

    it('clamps a clock that runs backwards to a zero delta', () => {
        let time = 100;
        const log: string[] = [];
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(createRecordingRuntime(log), () => undefined, {
            now: () => time,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        void loop.run();
        time = 50;
        scheduler.flush();

        expect(log).toEqual(['advance:0', 'advance:0']);
        loop.stop();
    });

    it('rejects when a frame throws', async () => {
        const loop = createFrameLoop(
            createRecordingRuntime([]),
            () => {
                throw new Error('render failed');
            },
            { now: () => 0, schedule: createFakeScheduler().schedule, logger: silentLogger },
        );

        await expect(loop.run()).rejects.toThrow('render failed');
        expect(loop.isRunning()).toBe(false);
    });

    it('refuses to run twice at once', async () => {
        const scheduler = createFakeScheduler();
        const loop = createFrameLoop(createRecordingRuntime([]), () => undefined, {
            now: () => 0,
            schedule: scheduler.schedule,
            logger: silentLogger,
        });

        const first = loop.run();

        await expect(loop.run()).rejects.toThrow('Frame loop is already running');
        loop.stop();
        await expect(first).resolves.toEqual({ reason: 'stopped', frames: 1 });
    });

    it('falls back to setTimeout pacing', async () => {
        vi.useFakeTimers();
        const renders = vi.fn();
        const loop = createFrameLoop(createRecordingRuntime([]), renders, {
            now: () => 0,
            maxFrames: 2,
            logger: silentLogger,
        });

        const exit = loop.run();
        expect(renders).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(17);

        await expect(exit).resolves.toEqual({ reason: 'stopped', frames: 2 });
    });
});
