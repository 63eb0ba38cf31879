/**
 * Level content
 *
 * Levels are plain text, one character per tile, stored as
 * `level1.txt`, `level2.txt`, ... in a single directory. The catalogue stops
 * at the first missing index; the lifecycle wraps back to the first level
 * once it runs past the end.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { gameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import type { TilePosition } from 'util/wrap';
import type { TileKind } from './types';

export const DEFAULT_LEVEL_DIRECTORY = fileURLToPath(new URL('../../levels', import.meta.url));

const TILE_SYMBOLS: Record<string, TileKind> = {
    '#': 'wall',
    '.': 'pellet',
    ' ': 'empty',
    '=': 'cage',
    'G': 'cage',
    '-': 'empty',
    'P': 'empty',
};

export class LevelFormatError extends Error {
    constructor(
        message: string,
        readonly levelIndex: number,
        readonly row?: number,
    ) {
        super(row === undefined ? `Level ${levelIndex}: ${message}` : `Level ${levelIndex}, row ${row}: ${message}`);
        this.name = 'LevelFormatError';
    }
}

export interface LevelLayout {
    readonly index: number;
    readonly width: number;
    readonly height: number;
    /** Tile kinds indexed by column, then row */
    readonly tiles: readonly (readonly TileKind[])[];
    readonly playerSpawn: TilePosition;
    readonly pursuerSpawns: readonly TilePosition[];
    readonly gates: readonly TilePosition[];
    readonly pelletCount: number;
}

export interface LevelDimensions {
    readonly width: number;
    readonly height: number;
}

const splitRows = (source: string): string[] => {
    const rows = source.split(/\r?\n/);
    while (rows.length > 0 && rows[rows.length - 1] === '') {
        rows.pop();
    }
    return rows;
};

export const parseLevelLayout = (
    source: string,
    index: number,
    dimensions: LevelDimensions = gameConfig.grid,
): LevelLayout => {
    const { width, height } = dimensions;
    const rows = splitRows(source);

    if (rows.length !== height) {
        throw new LevelFormatError(`expected ${height} rows, found ${rows.length}`, index);
    }

    const tiles: TileKind[][] = Array.from({ length: width }, () => new Array<TileKind>(height).fill('empty'));
    const pursuerSpawns: TilePosition[] = [];
    const gates: TilePosition[] = [];
    let playerSpawn: TilePosition | null = null;
    let pelletCount = 0;

    for (let y = 0; y < rows.length; y += 1) {
        const row = rows[y];
        if (row.length !== width) {
            throw new LevelFormatError(`expected ${width} columns, found ${row.length}`, index, y);
        }

        for (let x = 0; x < width; x += 1) {
            const symbol = row[x];
            const kind = TILE_SYMBOLS[symbol];
            if (!kind) {
                throw new LevelFormatError(`unknown tile symbol "${symbol}" at column ${x}`, index, y);
            }

            tiles[x][y] = kind;

            if (kind === 'pellet') {
                pelletCount += 1;
            } else if (symbol === 'G') {
                pursuerSpawns.push({ x, y });
            } else if (symbol === '-') {
                gates.push({ x, y });
            } else if (symbol === 'P') {
                if (playerSpawn) {
                    throw new LevelFormatError('more than one player spawn', index, y);
                }
                playerSpawn = { x, y };
            }
        }
    }

    if (!playerSpawn) {
        throw new LevelFormatError('missing player spawn "P"', index);
    }

    if (pursuerSpawns.length > 0 && gates.length === 0) {
        throw new LevelFormatError('pursuers need at least one gate "-" to leave the cage', index);
    }

    return {
        index,
        width,
        height,
        tiles,
        playerSpawn,
        pursuerSpawns,
        gates,
        pelletCount,
    };
};

export interface LevelCatalogue {
    readonly size: number;
    has(index: number): boolean;
    get(index: number): LevelLayout;
}

export const createLevelCatalogue = (layouts: readonly LevelLayout[]): LevelCatalogue => {
    const byIndex = new Map<number, LevelLayout>();
    for (const layout of layouts) {
        byIndex.set(layout.index, layout);
    }

    return {
        size: byIndex.size,
        has: (index) => byIndex.has(index),
        get: (index) => {
            const layout = byIndex.get(index);
            if (!layout) {
                throw new RangeError(`No level content for index ${index}`);
            }
            return layout;
        },
    };
};

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

export interface LoadLevelOptions {
    readonly dimensions?: LevelDimensions;
    readonly logger?: Logger;
}

export const levelFileName = (index: number): string => `level${index}.txt`;

/** Reads `level1.txt`, `level2.txt`, ... from `directory` until one is missing. */
export const loadLevelCatalogue = async (
    directory: string = DEFAULT_LEVEL_DIRECTORY,
    { dimensions = gameConfig.grid, logger = rootLogger.child('levels') }: LoadLevelOptions = {},
): Promise<LevelCatalogue> => {
    const layouts: LevelLayout[] = [];

    for (let index = 1; ; index += 1) {
        let source: string;
        try {
            source = await readFile(join(directory, levelFileName(index)), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                break;
            }
            throw error;
        }
        layouts.push(parseLevelLayout(source, index, dimensions));
    }

    if (layouts.length === 0) {
        throw new LevelFormatError(`no ${levelFileName(1)} found in ${directory}`, 1);
    }

    logger.info('Loaded level catalogue', { directory, levels: layouts.length });
    return createLevelCatalogue(layouts);
};
