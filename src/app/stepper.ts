import type { GameConfig } from 'config/game';
import { detectCatch, type PursuerSample } from 'game/collision';
import type { LevelEngine } from 'game/types';
import type { Logger } from 'util/log';
import { isOnTileCenter, isWithinGrid, toTilePosition, type AbsolutePosition } from 'util/wrap';
import type { GridChaseEventBus } from './events';
import type { LifecycleOrchestrator } from './lifecycle';
import type { GameSession } from './session';

export type StepOutcome = 'idle' | 'ran' | 'life-lost' | 'game-over' | 'level-advanced';

export interface StepReport {
    /** Simulation ticks executed by this call */
    readonly ticks: number;
    readonly outcome: StepOutcome;
}

export interface SimulationStepper {
    readonly tickMs: number;
    advance(realDeltaSeconds: number): StepReport;
}

export interface SimulationStepperOptions {
    readonly session: GameSession;
    readonly lifecycle: LifecycleOrchestrator;
    readonly bus: GridChaseEventBus;
    readonly config: GameConfig;
    readonly logger: Logger;
}

const IDLE: StepReport = { ticks: 0, outcome: 'idle' };

const toDeltaMs = (seconds: number): number => (Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0);

interface TickSnapshot {
    readonly player: AbsolutePosition;
    readonly pursuers: readonly AbsolutePosition[];
}

const capturePositions = (engine: LevelEngine): TickSnapshot => ({
    player: { ...engine.player.position },
    pursuers: engine.pursuers.map((pursuer) => ({ ...pursuer.position })),
});

/**
 * Converts variable frame time into a whole number of fixed ticks. Time that
 * does not add up to a full tick, or that is left over once the per-call cap
 * is reached, stays in the session budget for the next call.
 */
export const createSimulationStepper = ({
    session,
    lifecycle,
    bus,
    config,
    logger,
}: SimulationStepperOptions): SimulationStepper => {
    const tickMs = 1000 / config.simulation.tickRate;
    const { maxTicksPerFrame } = config.simulation;
    const { subUnitsPerTile } = config.grid;
    const threshold = config.collision.overlapThreshold;
    const reward = config.scoring.pelletReward;

    const eatPellet = (engine: LevelEngine): void => {
        const { player, grid } = engine;
        if (!isOnTileCenter(player.position, subUnitsPerTile)) {
            return;
        }

        const tile = toTilePosition(player.position, subUnitsPerTile);
        if (!isWithinGrid(tile, grid.width, grid.height)) {
            return;
        }

        const object = grid.at(tile.x, tile.y);
        if (!object || object.kind !== 'pellet' || object.destroyed) {
            return;
        }

        object.kind = 'empty';
        object.destroyed = true;
        engine.pelletsRemaining -= 1;
        session.score += reward;

        bus.publish('PelletEaten', {
            sessionId: session.sessionId,
            level: session.level,
            tile,
            scoreAwarded: reward,
            totalScore: session.score,
            pelletsRemaining: engine.pelletsRemaining,
        });
    };

    const advance: SimulationStepper['advance'] = (realDeltaSeconds) => {
        if (session.phase !== 'play' || session.gameOver) {
            return IDLE;
        }

        session.timeBudgetMs += toDeltaMs(realDeltaSeconds);

        let ticks = 0;
        while (session.timeBudgetMs >= tickMs && ticks < maxTicksPerFrame) {
            session.timeBudgetMs -= tickMs;
            ticks += 1;

            const engine = session.engine;
            const before = capturePositions(engine);
            engine.step();

            const pursuers: PursuerSample[] = engine.pursuers.map((pursuer, index) => ({
                id: pursuer.id,
                active: pursuer.active,
                caged: pursuer.caged,
                previous: before.pursuers[index] ?? pursuer.position,
                current: pursuer.position,
            }));
            const hit = detectCatch({ previous: before.player, current: engine.player.position }, pursuers, {
                xPeriod: engine.grid.width * subUnitsPerTile,
                threshold,
            });

            if (hit) {
                logger.debug('Player caught', { pursuer: hit.pursuerId, kind: hit.kind, ticks });
                const result = lifecycle.loseLife(hit);
                return { ticks, outcome: result === 'game-over' ? 'game-over' : 'life-lost' };
            }

            eatPellet(engine);

            if (engine.pelletsRemaining <= 0) {
                lifecycle.advanceLevel();
                return { ticks, outcome: 'level-advanced' };
            }
        }

        return ticks > 0 ? { ticks, outcome: 'ran' } : IDLE;
    };

    return {
        tickMs,
        advance,
    } satisfies SimulationStepper;
};
