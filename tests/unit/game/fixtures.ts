import type { LevelDimensions } from 'game/levels';

export const SMALL_DIMENSIONS: LevelDimensions = { width: 7, height: 5 };

/**
 * Row 2 is open at both edges so agents can leave one side and enter the other.
 */
export const SMALL_LEVEL = ['#######', '#.....#', '..P#...', '#=G-..#', '#######'].join('\n');

export const SMALL_LEVEL_PELLETS = 12;
