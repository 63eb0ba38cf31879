import type { GameSnapshot } from 'app/session';
import type { InputEvent } from 'app/state-machine';
import { DIRECTIONS, OPPOSITE_DIRECTION, type Direction } from 'game/types';
import type { SeededRandom } from 'util/random';
import { isOnTileCenter, toTilePosition, wrapCoordinate } from 'util/wrap';

export interface AutopilotOptions {
    readonly random: SeededRandom;
    readonly subUnitsPerTile: number;
    /** Chance of keeping the current heading at a junction */
    readonly persistence?: number;
}

export interface Autopilot {
    /** Input to feed the runtime for this frame, or null to leave it alone. */
    next(snapshot: GameSnapshot): InputEvent | null;
}

const DEFAULT_PERSISTENCE = 0.75;

const STEP: Record<Direction, readonly [number, number]> = {
    up: [0, -1],
    down: [0, 1],
    left: [-1, 0],
    right: [1, 0],
};

export const openDirections = (snapshot: GameSnapshot, subUnitsPerTile: number): Direction[] => {
    const width = snapshot.tiles.length;
    const tile = toTilePosition(snapshot.player.position, subUnitsPerTile);

    return DIRECTIONS.filter((direction) => {
        const [dx, dy] = STEP[direction];
        const column = snapshot.tiles[wrapCoordinate(tile.x + dx, width)];
        const y = tile.y + dy;
        if (y < 0 || y >= column.length) {
            return false;
        }
        const kind = column[y];
        return kind !== 'wall' && kind !== 'cage';
    });
};

/**
 * Seeded stand-in for a human player: starts the game from the title screen
 * and picks a new heading at junctions now and then.
 */
export const createAutopilot = ({
    random,
    subUnitsPerTile,
    persistence = DEFAULT_PERSISTENCE,
}: AutopilotOptions): Autopilot => {
    const next: Autopilot['next'] = (snapshot) => {
        if (snapshot.phase === 'title') {
            return { type: 'confirm' };
        }

        if (snapshot.phase !== 'play' || !isOnTileCenter(snapshot.player.position, subUnitsPerTile)) {
            return null;
        }

        const open = openDirections(snapshot, subUnitsPerTile);
        if (open.length === 0) {
            return null;
        }

        const { direction } = snapshot.player;
        if (open.includes(direction) && random.chance(persistence)) {
            return null;
        }

        const forward = open.filter((candidate) => candidate !== OPPOSITE_DIRECTION[direction]);
        return { type: 'direction', direction: random.pick(forward.length > 0 ? forward : open) };
    };

    return { next };
};
