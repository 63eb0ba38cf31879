/**
 * Coordinate helpers for a grid that wraps horizontally.
 *
 * Absolute coordinates are measured in sub-units (several per tile). The
 * horizontal axis is a ring of a given period; the vertical axis is a plain
 * bounded line.
 */

export interface AbsolutePosition {
    readonly x: number;
    readonly y: number;
}

export interface TilePosition {
    readonly x: number;
    readonly y: number;
}

const assertPeriod = (period: number): void => {
    if (!Number.isFinite(period) || period <= 0) {
        throw new RangeError(`period must be a positive finite number, received ${period}`);
    }
};

/** Non-negative remainder, so `wrapCoordinate(-1, 112) === 111`. */
export const wrapCoordinate = (value: number, period: number): number => {
    assertPeriod(period);
    const remainder = value % period;
    return remainder < 0 ? remainder + period : remainder;
};

/** Length of the shorter arc between `a` and `b` on a ring. */
export const wrapDistance = (a: number, b: number, period: number): number => {
    const forward = wrapCoordinate(Math.abs(a - b), period);
    return Math.min(forward, period - forward);
};

export const linearDistance = (a: number, b: number): number => Math.abs(a - b);

/**
 * Offset of `a` from `b` on a ring, normalised to `(-period / 2, period / 2]`.
 * Zero only when both points coincide.
 */
export const signedWrapDelta = (a: number, b: number, period: number): number => {
    const delta = wrapCoordinate(a - b, period);
    return delta > period / 2 ? delta - period : delta;
};

export const signedLinearDelta = (a: number, b: number): number => a - b;

export const isOnTileCenter = (position: AbsolutePosition, subUnitsPerTile: number): boolean =>
    position.x % subUnitsPerTile === 0 && position.y % subUnitsPerTile === 0;

export const toTilePosition = (position: AbsolutePosition, subUnitsPerTile: number): TilePosition => ({
    x: Math.floor(position.x / subUnitsPerTile),
    y: Math.floor(position.y / subUnitsPerTile),
});

export const toAbsolutePosition = (tile: TilePosition, subUnitsPerTile: number): AbsolutePosition => ({
    x: tile.x * subUnitsPerTile,
    y: tile.y * subUnitsPerTile,
});

export const isWithinGrid = (tile: TilePosition, width: number, height: number): boolean =>
    tile.x >= 0 && tile.x < width && tile.y >= 0 && tile.y < height;
