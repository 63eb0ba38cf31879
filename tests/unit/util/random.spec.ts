import { describe, expect, it } from 'vitest';
import { createSeededRandom, mulberry32 } from 'util/random';

const sample = (source: () => number, count: number): number[] => {
    return Array.from({ length: count }, () => source());
};

describe('mulberry32', () => {
    it('produces deterministic sequences for the same seed', () => {
        const sequenceA = sample(mulberry32(1234), 5);
        const sequenceB = sample(mulberry32(1234), 5);
        expect(sequenceA).toEqual(sequenceB);
    });

    it('produces distinct sequences for different seeds', () => {
        const sequenceA = sample(mulberry32(1), 3);
        const sequenceB = sample(mulberry32(2), 3);
        expect(sequenceA).not.toEqual(sequenceB);
    });

    it('stays within [0, 1)', () => {
        for (const value of sample(mulberry32(99), 200)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('createSeededRandom', () => {
    it('normalises unusable seeds to the default', () => {
        expect(createSeededRandom(0).seed).toBe(1);
        expect(createSeededRandom(Number.NaN).seed).toBe(1);
        expect(createSeededRandom(7.9).seed).toBe(7);
        expect(createSeededRandom().seed).toBe(1);
    });

    it('repeats the same choices for the same seed', () => {
        const first = createSeededRandom(42);
        const second = createSeededRandom(42);
        const items = ['up', 'left', 'down', 'right'] as const;

        const picksA = Array.from({ length: 10 }, () => first.pick(items));
        const picksB = Array.from({ length: 10 }, () => second.pick(items));

        expect(picksA).toEqual(picksB);
    });

    it('generates bounded integers', () => {
        const random = createSeededRandom(123);
        for (let i = 0; i < 100; i += 1) {
            const value = random.nextInt(6);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(6);
        }
    });

    it('treats chance bounds as never and always', () => {
        const random = createSeededRandom(5);
        expect(Array.from({ length: 20 }, () => random.chance(0))).not.toContain(true);
        expect(Array.from({ length: 20 }, () => random.chance(1))).not.toContain(false);
    });

    it('rejects invalid ranges and empty lists', () => {
        const random = createSeededRandom(5);
        expect(() => random.nextInt(0)).toThrow(RangeError);
        expect(() => random.pick([])).toThrow(RangeError);
    });
});
