import { gameConfig, type GameConfig } from 'config/game';
import { createSeededRandom, type SeededRandom } from 'util/random';
import {
    isOnTileCenter,
    linearDistance,
    toAbsolutePosition,
    toTilePosition,
    wrapCoordinate,
    wrapDistance,
    type AbsolutePosition,
} from 'util/wrap';
import type { LevelCatalogue, LevelLayout } from './levels';
import {
    DIRECTIONS,
    OPPOSITE_DIRECTION,
    type Direction,
    type LevelEngine,
    type LevelEngineFactory,
    type PlayerAgent,
    type PursuerAgent,
    type TileGrid,
    type TileObject,
} from './types';

const DIRECTION_VECTORS: Record<Direction, { readonly dx: number; readonly dy: number }> = {
    up: { dx: 0, dy: -1 },
    down: { dx: 0, dy: 1 },
    left: { dx: -1, dy: 0 },
    right: { dx: 1, dy: 0 },
};

export const createTileGrid = (layout: LevelLayout): TileGrid => {
    const cells: TileObject[][] = layout.tiles.map((column) =>
        column.map((kind) => ({ kind, destroyed: false })),
    );

    return {
        width: layout.width,
        height: layout.height,
        at: (x, y) => {
            if (x < 0 || x >= layout.width || y < 0 || y >= layout.height) {
                return undefined;
            }
            return cells[x][y];
        },
    };
};

export interface GridLevelEngineOptions {
    readonly layout: LevelLayout;
    readonly subUnitsPerTile?: number;
    readonly playerStep?: number;
    readonly pursuerStep?: number;
    readonly releaseDelays?: readonly number[];
    readonly wander?: number;
    readonly random?: SeededRandom;
}

export interface GridLevelEngine extends LevelEngine {
    /** Ticks stepped since the level was created */
    readonly ticks: number;
}

/**
 * Reference level collaborator: moves the player along its requested
 * direction and lets pursuers out of the cage one by one to chase it.
 */
export const createGridLevelEngine = ({
    layout,
    subUnitsPerTile = gameConfig.grid.subUnitsPerTile,
    playerStep = gameConfig.engine.playerStep,
    pursuerStep = gameConfig.engine.pursuerStep,
    releaseDelays = gameConfig.engine.releaseDelays,
    wander = gameConfig.engine.wander,
    random = createSeededRandom(),
}: GridLevelEngineOptions): GridLevelEngine => {
    const grid = createTileGrid(layout);
    const xPeriod = layout.width * subUnitsPerTile;

    const player: PlayerAgent = {
        id: 'player',
        position: toAbsolutePosition(layout.playerSpawn, subUnitsPerTile),
        active: false,
        direction: 'left',
        nextDirection: null,
    };

    const pursuers: PursuerAgent[] = layout.pursuerSpawns.map((spawn, index) => ({
        id: `pursuer-${index + 1}`,
        position: toAbsolutePosition(spawn, subUnitsPerTile),
        active: true,
        caged: true,
        direction: 'up',
    }));

    let ticks = 0;

    const isPassable = (tileX: number, tileY: number): boolean => {
        const tile = grid.at(wrapCoordinate(tileX, layout.width), tileY);
        return tile !== undefined && tile.kind !== 'wall' && tile.kind !== 'cage';
    };

    // Only meaningful on a tile centre; between tiles the agent is already committed.
    const canMove = (position: AbsolutePosition, direction: Direction): boolean => {
        const tile = toTilePosition(position, subUnitsPerTile);
        const { dx, dy } = DIRECTION_VECTORS[direction];
        return isPassable(tile.x + dx, tile.y + dy);
    };

    const advanceOneUnit = (position: AbsolutePosition, direction: Direction): AbsolutePosition => {
        const { dx, dy } = DIRECTION_VECTORS[direction];
        return {
            x: wrapCoordinate(position.x + dx, xPeriod),
            y: position.y + dy,
        };
    };

    const movePlayerUnit = (): boolean => {
        if (isOnTileCenter(player.position, subUnitsPerTile)) {
            if (player.nextDirection && canMove(player.position, player.nextDirection)) {
                player.direction = player.nextDirection;
            }
            if (!canMove(player.position, player.direction)) {
                return false;
            }
        } else if (player.nextDirection === OPPOSITE_DIRECTION[player.direction]) {
            player.direction = player.nextDirection;
        }

        player.position = advanceOneUnit(player.position, player.direction);
        return true;
    };

    const scoreTowardsPlayer = (position: AbsolutePosition, direction: Direction): number => {
        const from = toTilePosition(position, subUnitsPerTile);
        const target = toTilePosition(player.position, subUnitsPerTile);
        const { dx, dy } = DIRECTION_VECTORS[direction];
        return wrapDistance(from.x + dx, target.x, layout.width) + linearDistance(from.y + dy, target.y);
    };

    const choosePursuerDirection = (pursuer: PursuerAgent): Direction | null => {
        const reverse = OPPOSITE_DIRECTION[pursuer.direction];
        const options = DIRECTIONS.filter(
            (direction) => direction !== reverse && canMove(pursuer.position, direction),
        );

        if (options.length === 0) {
            return canMove(pursuer.position, reverse) ? reverse : null;
        }

        if (options.length === 1) {
            return options[0];
        }

        if (random.chance(wander)) {
            return random.pick(options);
        }

        let best = options[0];
        let bestScore = scoreTowardsPlayer(pursuer.position, best);
        for (const candidate of options.slice(1)) {
            const score = scoreTowardsPlayer(pursuer.position, candidate);
            if (score < bestScore) {
                best = candidate;
                bestScore = score;
            }
        }
        return best;
    };

    const movePursuerUnit = (pursuer: PursuerAgent): boolean => {
        if (isOnTileCenter(pursuer.position, subUnitsPerTile)) {
            const direction = choosePursuerDirection(pursuer);
            if (!direction) {
                return false;
            }
            pursuer.direction = direction;
        }

        pursuer.position = advanceOneUnit(pursuer.position, pursuer.direction);
        return true;
    };

    const releaseDelayFor = (index: number): number => {
        if (releaseDelays.length === 0) {
            return 0;
        }
        return releaseDelays[Math.min(index, releaseDelays.length - 1)];
    };

    const releasePursuers = () => {
        pursuers.forEach((pursuer, index) => {
            if (!pursuer.caged || ticks < releaseDelayFor(index)) {
                return;
            }
            const gate = layout.gates[index % layout.gates.length];
            pursuer.caged = false;
            pursuer.position = toAbsolutePosition(gate, subUnitsPerTile);
            pursuer.direction = 'up';
        });
    };

    const step = () => {
        ticks += 1;

        if (player.active) {
            for (let unit = 0; unit < playerStep; unit += 1) {
                if (!movePlayerUnit()) {
                    break;
                }
            }
        }

        for (const pursuer of pursuers) {
            if (!pursuer.active || pursuer.caged) {
                continue;
            }
            for (let unit = 0; unit < pursuerStep; unit += 1) {
                if (!movePursuerUnit(pursuer)) {
                    break;
                }
            }
        }

        releasePursuers();
    };

    return {
        levelIndex: layout.index,
        grid,
        player,
        pursuers,
        pelletsRemaining: layout.pelletCount,
        step,
        get ticks() {
            return ticks;
        },
    };
};

export interface GridLevelEngineFactoryOptions {
    readonly catalogue: LevelCatalogue;
    readonly config?: GameConfig;
    readonly random?: SeededRandom;
}

export const createGridLevelEngineFactory = ({
    catalogue,
    config = gameConfig,
    random = createSeededRandom(),
}: GridLevelEngineFactoryOptions): LevelEngineFactory => (levelIndex) =>
    createGridLevelEngine({
        layout: catalogue.get(levelIndex),
        subUnitsPerTile: config.grid.subUnitsPerTile,
        playerStep: config.engine.playerStep,
        pursuerStep: config.engine.pursuerStep,
        releaseDelays: config.engine.releaseDelays,
        wander: config.engine.wander,
        random,
    });
