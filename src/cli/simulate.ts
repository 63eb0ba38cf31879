import { resolve as resolvePath } from 'node:path';
import type { AnyEventEnvelope, GamePhase } from 'app/events';
import { createGameRuntime } from 'app/game-runtime';
import { createFrameLoop, type FrameLoopRuntime, type FrameScheduler } from 'app/loop';
import { gameConfig } from 'config/game';
import { DEFAULT_LEVEL_DIRECTORY, loadLevelCatalogue } from 'game/levels';
import { createLogger, stderrLogWriter, type Logger } from 'util/log';
import { createSeededRandom } from 'util/random';
import { createAutopilot } from './autopilot';

export interface SimulationOptions {
    readonly telemetry?: boolean;
}

export interface SimulationInput {
    readonly mode: 'simulate';
    readonly seed?: number;
    readonly durationSec?: number;
    readonly fps?: number;
    readonly levelsDir?: string;
    readonly options?: SimulationOptions;
    readonly logger?: Logger;
}

export interface SimulationMetrics {
    readonly pelletsEaten: number;
    readonly livesLost: number;
    readonly levelsAdvanced: number;
}

export interface SimulationResult {
    readonly ok: true;
    readonly sessionId: string;
    readonly seed: number;
    readonly durationMs: number;
    readonly frames: number;
    readonly ticks: number;
    readonly score: number;
    readonly lives: number;
    readonly level: number;
    readonly phase: GamePhase;
    readonly gameOver: boolean;
    readonly metrics: SimulationMetrics;
    readonly telemetry?: {
        readonly events: readonly AnyEventEnvelope[];
    };
}

const DEFAULT_SEED = 1;
const DEFAULT_DURATION_SEC = 180;
const DEFAULT_FPS = gameConfig.simulation.frameRate;

const resolveFps = (fps: number | undefined): number =>
    typeof fps === 'number' && Number.isFinite(fps) && fps > 0 ? fps : DEFAULT_FPS;

/**
 * Plays one seeded session through the real frame loop on a virtual clock.
 * Frames run back to back; each scheduled frame advances the clock by one
 * frame interval, so the outcome depends only on the input.
 */
export const runHeadlessSimulation = async (input: SimulationInput): Promise<SimulationResult> => {
    const seed = typeof input.seed === 'number' ? input.seed : DEFAULT_SEED;
    const durationSec = typeof input.durationSec === 'number' ? Math.max(1, input.durationSec) : DEFAULT_DURATION_SEC;
    const fps = resolveFps(input.fps);
    const telemetryRequested = input.options?.telemetry ?? false;
    const logger = input.logger ?? createLogger('cli', { writer: stderrLogWriter });

    const directory = input.levelsDir ? resolvePath(process.cwd(), input.levelsDir) : DEFAULT_LEVEL_DIRECTORY;
    const catalogue = await loadLevelCatalogue(directory, { logger: logger.child('levels') });

    const frameMs = 1000 / fps;
    let clock = 0;

    const runtime = createGameRuntime({
        catalogue,
        random: createSeededRandom(seed),
        sessionId: `sim-${seed}`,
        now: () => clock,
        logger: logger.child('runtime'),
    });

    const metrics = { pelletsEaten: 0, livesLost: 0, levelsAdvanced: 0 };
    const events: AnyEventEnvelope[] = [];
    runtime.events.subscribe('PelletEaten', () => {
        metrics.pelletsEaten += 1;
    });
    runtime.events.subscribe('LifeLost', () => {
        metrics.livesLost += 1;
    });
    runtime.events.subscribe('LevelAdvanced', () => {
        metrics.levelsAdvanced += 1;
    });
    if (telemetryRequested) {
        runtime.events.subscribeAll((event) => {
            events.push(event);
        });
    }

    let ticks = 0;
    const tracked: FrameLoopRuntime = {
        handleInput: runtime.handleInput,
        advance: (realDeltaSeconds) => {
            const report = runtime.advance(realDeltaSeconds);
            ticks += report.ticks;
            return report;
        },
        snapshot: runtime.snapshot,
    };

    const schedule: FrameScheduler = (callback) => {
        const handle = setImmediate(() => {
            clock += frameMs;
            callback();
        });
        return () => {
            clearImmediate(handle);
        };
    };

    const autopilot = createAutopilot({
        random: createSeededRandom(seed + 1),
        subUnitsPerTile: runtime.config.grid.subUnitsPerTile,
    });

    const loop = createFrameLoop(
        tracked,
        (snapshot) => {
            if (snapshot.gameOver) {
                loop.stop();
                return;
            }
            const event = autopilot.next(snapshot);
            if (event) {
                loop.enqueue(event);
            }
        },
        {
            frameRate: fps,
            maxFrames: Math.max(1, Math.round(durationSec * fps)),
            now: () => clock,
            schedule,
            logger: logger.child('loop'),
        },
    );

    const exit = await loop.run();
    const { session } = runtime;

    return {
        ok: true,
        sessionId: session.sessionId,
        seed,
        durationMs: Math.round(clock),
        frames: exit.frames,
        ticks,
        score: session.score,
        lives: session.lives,
        level: session.level,
        phase: session.phase,
        gameOver: session.gameOver,
        metrics: { ...metrics },
        telemetry: telemetryRequested ? { events } : undefined,
    };
};
