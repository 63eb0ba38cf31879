import type { GameConfig } from 'config/game';
import type { CollisionHit } from 'game/collision';
import type { LevelCatalogue } from 'game/levels';
import type { LevelEngineFactory } from 'game/types';
import type { Logger } from 'util/log';
import type { GridChaseEventBus } from './events';
import { replaceEngine, transitionPhase, type GameSession } from './session';

export type LifeLossResult = 'respawned' | 'game-over';

export interface LevelAdvanceResult {
    readonly fromLevel: number;
    readonly toLevel: number;
    readonly wrapped: boolean;
}

export interface LifecycleOrchestrator {
    /** Charges one life for a catch and either restarts the level or ends the game. */
    loseLife(hit: CollisionHit): LifeLossResult;
    /** Moves to the next level, or back to the first when no content exists for it. */
    advanceLevel(): LevelAdvanceResult;
    /** Returns the session to its initial title-screen state. */
    resetSession(): void;
}

export interface LifecycleOptions {
    readonly session: GameSession;
    readonly engineFactory: LevelEngineFactory;
    readonly catalogue: Pick<LevelCatalogue, 'has'>;
    readonly bus: GridChaseEventBus;
    readonly config: GameConfig;
    readonly logger: Logger;
}

export const createLifecycleOrchestrator = ({
    session,
    engineFactory,
    catalogue,
    bus,
    config,
    logger,
}: LifecycleOptions): LifecycleOrchestrator => {
    const loseLife: LifecycleOrchestrator['loseLife'] = (hit) => {
        session.lives -= 1;

        bus.publish('LifeLost', {
            sessionId: session.sessionId,
            level: session.level,
            livesRemaining: session.lives,
            pursuerId: hit.pursuerId,
            collision: hit.kind,
        });

        if (session.lives < 0) {
            session.gameOver = true;
            transitionPhase(session, bus, 'game-over');
            bus.publish('GameOver', {
                sessionId: session.sessionId,
                level: session.level,
                finalScore: session.score,
            });
            logger.info('Game over', { level: session.level, score: session.score, pursuer: hit.pursuerId });
            return 'game-over';
        }

        replaceEngine(session, engineFactory, session.level);
        logger.info('Life lost', {
            level: session.level,
            livesRemaining: session.lives,
            pursuer: hit.pursuerId,
            collision: hit.kind,
        });
        return 'respawned';
    };

    const advanceLevel: LifecycleOrchestrator['advanceLevel'] = () => {
        const fromLevel = session.level;
        const candidate = fromLevel + 1;
        const wrapped = !catalogue.has(candidate);
        const toLevel = wrapped ? config.session.firstLevel : candidate;

        if (wrapped) {
            logger.info('No content for next level, wrapping to first level', { requested: candidate, toLevel });
        }

        replaceEngine(session, engineFactory, toLevel);
        bus.publish('LevelAdvanced', { sessionId: session.sessionId, fromLevel, toLevel, wrapped });
        logger.info('Level advanced', { fromLevel, toLevel, score: session.score });
        return { fromLevel, toLevel, wrapped };
    };

    const resetSession: LifecycleOrchestrator['resetSession'] = () => {
        const previousScore = session.score;
        session.score = 0;
        session.lives = config.session.initialLives;
        session.level = config.session.firstLevel;
        session.gameOver = false;
        session.timeBudgetMs = 0;
        session.engine = engineFactory(config.session.firstLevel);

        bus.publish('SessionReset', { sessionId: session.sessionId, previousScore });
        transitionPhase(session, bus, 'title');
        logger.info('Session reset', { previousScore });
    };

    return {
        loseLife,
        advanceLevel,
        resetSession,
    } satisfies LifecycleOrchestrator;
};
