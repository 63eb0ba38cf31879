export type RandomSource = () => number;

const DEFAULT_SEED = 1;

const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = Math.trunc(seed) >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

/** Small, fast 32-bit generator; identical seeds give identical sequences. */
export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface SeededRandom {
    readonly seed: number;
    readonly next: RandomSource;
    readonly nextInt: (maxExclusive: number) => number;
    readonly chance: (probability: number) => boolean;
    readonly pick: <T>(items: readonly T[]) => T;
}

export const createSeededRandom = (seed: number = DEFAULT_SEED): SeededRandom => {
    const normalized = normalizeSeed(seed);
    const next = mulberry32(normalized);

    const nextInt = (maxExclusive: number): number => {
        if (!Number.isFinite(maxExclusive) || maxExclusive < 1) {
            throw new RangeError('maxExclusive must be a positive finite number');
        }
        return Math.floor(next() * maxExclusive);
    };

    const chance = (probability: number): boolean => next() < Math.max(0, Math.min(1, probability));

    const pick = <T>(items: readonly T[]): T => {
        if (items.length === 0) {
            throw new RangeError('cannot pick from an empty list');
        }
        return items[nextInt(items.length)];
    };

    return {
        seed: normalized,
        next,
        nextInt,
        chance,
        pick,
    };
};
