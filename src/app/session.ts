import type { GameConfig } from 'config/game';
import type { Direction, LevelEngine, LevelEngineFactory, TileKind } from 'game/types';
import type { AbsolutePosition } from 'util/wrap';
import type { GamePhase, GridChaseEventBus } from './events';

/**
 * Everything one play session owns. The runtime holds exactly one of these;
 * the stepper, state machine and lifecycle mutate it in place.
 */
export interface GameSession {
    readonly sessionId: string;
    score: number;
    lives: number;
    level: number;
    phase: GamePhase;
    gameOver: boolean;
    /** Real time accumulated but not yet consumed by ticks, in milliseconds */
    timeBudgetMs: number;
    engine: LevelEngine;
}

export interface GameSessionOptions {
    readonly config: GameConfig;
    readonly engineFactory: LevelEngineFactory;
    readonly sessionId?: string;
    readonly random?: () => number;
}

const generateSessionId = (random: () => number): string => {
    const value = Math.floor(random() * 0xffffffff);
    return `session-${value.toString(16).padStart(8, '0')}`;
};

export const createGameSession = ({
    config,
    engineFactory,
    sessionId,
    random = Math.random,
}: GameSessionOptions): GameSession => ({
    sessionId: sessionId ?? generateSessionId(random),
    score: 0,
    lives: config.session.initialLives,
    level: config.session.firstLevel,
    phase: 'title',
    gameOver: false,
    timeBudgetMs: 0,
    engine: engineFactory(config.session.firstLevel),
});

/** Swaps in a fresh level instance, activates the player and clears the time budget. */
export const replaceEngine = (session: GameSession, engineFactory: LevelEngineFactory, level: number): void => {
    session.level = level;
    session.engine = engineFactory(level);
    session.engine.player.active = true;
    session.timeBudgetMs = 0;
};

export const transitionPhase = (session: GameSession, bus: GridChaseEventBus, to: GamePhase): void => {
    const from = session.phase;
    if (from === to) {
        return;
    }
    session.phase = to;
    bus.publish('PhaseChanged', { sessionId: session.sessionId, from, to });
};

export interface PlayerSnapshot {
    readonly id: string;
    readonly position: AbsolutePosition;
    readonly direction: Direction;
    readonly nextDirection: Direction | null;
    readonly active: boolean;
}

export interface PursuerSnapshot {
    readonly id: string;
    readonly position: AbsolutePosition;
    readonly direction: Direction;
    readonly active: boolean;
    readonly caged: boolean;
}

export interface GameSnapshot {
    readonly sessionId: string;
    readonly phase: GamePhase;
    readonly score: number;
    readonly lives: number;
    readonly level: number;
    readonly gameOver: boolean;
    readonly pelletsRemaining: number;
    readonly player: PlayerSnapshot;
    readonly pursuers: readonly PursuerSnapshot[];
    /** Tile kinds indexed by column, then row */
    readonly tiles: readonly (readonly TileKind[])[];
}

const snapshotTiles = (engine: LevelEngine): TileKind[][] => {
    const { grid } = engine;
    const columns: TileKind[][] = [];
    for (let x = 0; x < grid.width; x += 1) {
        const column: TileKind[] = [];
        for (let y = 0; y < grid.height; y += 1) {
            column.push(grid.at(x, y)?.kind ?? 'empty');
        }
        columns.push(column);
    }
    return columns;
};

export const snapshotSession = (session: GameSession): GameSnapshot => {
    const { engine } = session;
    const { player } = engine;

    return {
        sessionId: session.sessionId,
        phase: session.phase,
        score: session.score,
        lives: session.lives,
        level: session.level,
        gameOver: session.gameOver,
        pelletsRemaining: engine.pelletsRemaining,
        player: {
            id: player.id,
            position: { ...player.position },
            direction: player.direction,
            nextDirection: player.nextDirection,
            active: player.active,
        },
        pursuers: engine.pursuers.map((pursuer) => ({
            id: pursuer.id,
            position: { ...pursuer.position },
            direction: pursuer.direction,
            active: pursuer.active,
            caged: pursuer.caged,
        })),
        tiles: snapshotTiles(engine),
    };
};
