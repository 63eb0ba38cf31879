import type { AbsolutePosition } from 'util/wrap';

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'left', 'down', 'right'];

export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
    up: 'down',
    down: 'up',
    left: 'right',
    right: 'left',
};

export type TileKind = 'wall' | 'cage' | 'pellet' | 'empty';

/**
 * A single grid cell. `destroyed` only ever turns true for a pellet that has
 * been eaten, at which point the kind is also relabelled `empty`.
 */
export interface TileObject {
    kind: TileKind;
    destroyed: boolean;
}

export interface TileGrid {
    readonly width: number;
    readonly height: number;
    /** Tile at column `x`, row `y`, or `undefined` outside the grid. */
    at(x: number, y: number): TileObject | undefined;
}

export interface PlayerAgent {
    readonly id: 'player';
    position: AbsolutePosition;
    active: boolean;
    direction: Direction;
    nextDirection: Direction | null;
}

export interface PursuerAgent {
    readonly id: string;
    position: AbsolutePosition;
    active: boolean;
    caged: boolean;
    direction: Direction;
}

/**
 * The level collaborator the simulation core drives. It owns the grid, the
 * agents and their movement; the core only flips the player's `active` flag,
 * relabels eaten pellets and decrements `pelletsRemaining`.
 */
export interface LevelEngine {
    readonly levelIndex: number;
    readonly grid: TileGrid;
    readonly player: PlayerAgent;
    readonly pursuers: readonly PursuerAgent[];
    pelletsRemaining: number;
    /** Advance every agent by exactly one simulation tick. */
    step(): void;
}

export type LevelEngineFactory = (levelIndex: number) => LevelEngine;
