import { createLogger } from 'util/log';

interface GridConfig {
    /** Columns in a level layout */
    readonly width: number;
    /** Rows in a level layout */
    readonly height: number;
    /** Absolute sub-units per tile on each axis */
    readonly subUnitsPerTile: number;
}

interface SimulationConfig {
    /** Fixed simulation ticks per second */
    readonly tickRate: number;
    /** Upper bound on ticks run by a single advance call */
    readonly maxTicksPerFrame: number;
    /** Target render frames per second for the frame loop */
    readonly frameRate: number;
}

interface CollisionConfig {
    /** Sub-unit tolerance used by both the overlap and alignment checks */
    readonly overlapThreshold: number;
}

interface ScoringConfig {
    readonly pelletReward: number;
}

interface SessionConfig {
    readonly initialLives: number;
    readonly firstLevel: number;
}

export interface ScreenRect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

interface ScreenConfig {
    readonly width: number;
    readonly height: number;
    readonly startControl: ScreenRect;
}

interface EngineConfig {
    /** Sub-units the player travels per tick */
    readonly playerStep: number;
    /** Sub-units a released pursuer travels per tick */
    readonly pursuerStep: number;
    /** Ticks before each pursuer leaves the cage, by spawn order */
    readonly releaseDelays: readonly number[];
    /** Probability that a pursuer ignores the player at a junction */
    readonly wander: number;
}

export interface GameConfig {
    readonly grid: GridConfig;
    readonly simulation: SimulationConfig;
    readonly collision: CollisionConfig;
    readonly scoring: ScoringConfig;
    readonly session: SessionConfig;
    readonly screen: ScreenConfig;
    readonly engine: EngineConfig;
}

const SCREEN_WIDTH = 540;
const SCREEN_HEIGHT = 820;
const START_CONTROL_WIDTH = 180;
const START_CONTROL_HEIGHT = 56;

export const gameConfig = {
    grid: {
        width: 28,
        height: 32,
        subUnitsPerTile: 4,
    },
    simulation: {
        tickRate: 10,
        maxTicksPerFrame: 5,
        frameRate: 60,
    },
    collision: {
        overlapThreshold: 3,
    },
    scoring: {
        pelletReward: 10,
    },
    session: {
        initialLives: 2,
        firstLevel: 1,
    },
    screen: {
        width: SCREEN_WIDTH,
        height: SCREEN_HEIGHT,
        startControl: {
            x: Math.floor((SCREEN_WIDTH - START_CONTROL_WIDTH) / 2),
            y: Math.floor(SCREEN_HEIGHT * 0.64),
            width: START_CONTROL_WIDTH,
            height: START_CONTROL_HEIGHT,
        },
    },
    engine: {
        playerStep: 1,
        pursuerStep: 1,
        releaseDelays: [0, 30, 60, 90],
        wander: 0.25,
    },
} as const satisfies GameConfig;

export interface GameConfigOverrides {
    readonly grid?: Partial<GridConfig>;
    readonly simulation?: Partial<SimulationConfig>;
    readonly collision?: Partial<CollisionConfig>;
    readonly scoring?: Partial<ScoringConfig>;
    readonly session?: Partial<SessionConfig>;
    readonly screen?: Partial<ScreenConfig>;
    readonly engine?: Partial<EngineConfig>;
}

const configLogger = createLogger('config');

const positiveInteger = (key: string, value: number | undefined, fallback: number, min = 1): number => {
    if (value === undefined) {
        return fallback;
    }
    if (!Number.isInteger(value) || value < min) {
        configLogger.warn('Ignoring invalid override', { key, value, fallback });
        return fallback;
    }
    return value;
};

const positiveNumber = (key: string, value: number | undefined, fallback: number): number => {
    if (value === undefined) {
        return fallback;
    }
    if (!Number.isFinite(value) || value <= 0) {
        configLogger.warn('Ignoring invalid override', { key, value, fallback });
        return fallback;
    }
    return value;
};

const probability = (key: string, value: number | undefined, fallback: number): number => {
    if (value === undefined) {
        return fallback;
    }
    if (!Number.isFinite(value) || value < 0 || value > 1) {
        configLogger.warn('Ignoring invalid override', { key, value, fallback });
        return fallback;
    }
    return value;
};

/**
 * Merges overrides onto the defaults. Values that would break the simulation
 * (non-positive rates, a tick cap below one, fractional grid sizes) are
 * dropped in favour of the default.
 */
export const resolveGameConfig = (overrides: GameConfigOverrides = {}, base: GameConfig = gameConfig): GameConfig => {
    const { grid = {}, simulation = {}, collision = {}, scoring = {}, session = {}, screen = {}, engine = {} } = overrides;

    let releaseDelays = base.engine.releaseDelays;
    if (engine.releaseDelays) {
        if (engine.releaseDelays.every((delay) => Number.isInteger(delay) && delay >= 0)) {
            releaseDelays = engine.releaseDelays;
        } else {
            configLogger.warn('Ignoring invalid override', { key: 'engine.releaseDelays', value: engine.releaseDelays });
        }
    }

    return {
        grid: {
            width: positiveInteger('grid.width', grid.width, base.grid.width),
            height: positiveInteger('grid.height', grid.height, base.grid.height),
            subUnitsPerTile: positiveInteger('grid.subUnitsPerTile', grid.subUnitsPerTile, base.grid.subUnitsPerTile),
        },
        simulation: {
            tickRate: positiveNumber('simulation.tickRate', simulation.tickRate, base.simulation.tickRate),
            maxTicksPerFrame: positiveInteger(
                'simulation.maxTicksPerFrame',
                simulation.maxTicksPerFrame,
                base.simulation.maxTicksPerFrame,
            ),
            frameRate: positiveNumber('simulation.frameRate', simulation.frameRate, base.simulation.frameRate),
        },
        collision: {
            overlapThreshold: positiveInteger(
                'collision.overlapThreshold',
                collision.overlapThreshold,
                base.collision.overlapThreshold,
                0,
            ),
        },
        scoring: {
            pelletReward: positiveInteger('scoring.pelletReward', scoring.pelletReward, base.scoring.pelletReward, 0),
        },
        session: {
            initialLives: positiveInteger('session.initialLives', session.initialLives, base.session.initialLives, 0),
            firstLevel: positiveInteger('session.firstLevel', session.firstLevel, base.session.firstLevel),
        },
        screen: {
            width: positiveNumber('screen.width', screen.width, base.screen.width),
            height: positiveNumber('screen.height', screen.height, base.screen.height),
            startControl: screen.startControl ?? base.screen.startControl,
        },
        engine: {
            playerStep: positiveInteger('engine.playerStep', engine.playerStep, base.engine.playerStep),
            pursuerStep: positiveInteger('engine.pursuerStep', engine.pursuerStep, base.engine.pursuerStep),
            releaseDelays,
            wander: probability('engine.wander', engine.wander, base.engine.wander),
        },
    } satisfies GameConfig;
};
