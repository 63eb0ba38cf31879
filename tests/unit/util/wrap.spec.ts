import { describe, expect, it } from 'vitest';
import {
    isOnTileCenter,
    isWithinGrid,
    linearDistance,
    signedLinearDelta,
    signedWrapDelta,
    toAbsolutePosition,
    toTilePosition,
    wrapCoordinate,
    wrapDistance,
} from 'util/wrap';

const PERIOD = 112;

describe('wrapCoordinate', () => {
    it('keeps in-range values and folds values outside the period', () => {
        expect(wrapCoordinate(5, PERIOD)).toBe(5);
        expect(wrapCoordinate(112, PERIOD)).toBe(0);
        expect(wrapCoordinate(-1, PERIOD)).toBe(111);
        expect(wrapCoordinate(-113, PERIOD)).toBe(111);
    });

    it('rejects non-positive or non-finite periods', () => {
        expect(() => wrapCoordinate(1, 0)).toThrow(RangeError);
        expect(() => wrapCoordinate(1, -4)).toThrow(RangeError);
        expect(() => wrapCoordinate(1, Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });
});

describe('wrapDistance', () => {
    it('measures the short way around the ring', () => {
        expect(wrapDistance(1, 111, PERIOD)).toBe(2);
        expect(wrapDistance(111, 1, PERIOD)).toBe(2);
        expect(wrapDistance(10, 30, PERIOD)).toBe(20);
    });

    it('peaks at half the period', () => {
        expect(wrapDistance(0, 56, PERIOD)).toBe(56);
        expect(wrapDistance(0, 57, PERIOD)).toBe(55);
    });

    it('is zero for aligned points', () => {
        expect(wrapDistance(40, 40, PERIOD)).toBe(0);
        expect(wrapDistance(0, 112, PERIOD)).toBe(0);
    });
});

describe('linearDistance', () => {
    it('returns the absolute difference', () => {
        expect(linearDistance(3, 10)).toBe(7);
        expect(linearDistance(10, 3)).toBe(7);
    });
});

describe('signedWrapDelta', () => {
    it('normalises to the half-open interval around zero', () => {
        expect(signedWrapDelta(1, 111, PERIOD)).toBe(2);
        expect(signedWrapDelta(111, 1, PERIOD)).toBe(-2);
        expect(signedWrapDelta(0, 56, PERIOD)).toBe(56);
        expect(signedWrapDelta(56, 0, PERIOD)).toBe(56);
        expect(signedWrapDelta(57, 0, PERIOD)).toBe(-55);
    });

    it('is zero only when aligned', () => {
        expect(signedWrapDelta(20, 20, PERIOD)).toBe(0);
        expect(signedWrapDelta(20, 21, PERIOD)).toBe(-1);
    });
});

describe('signedLinearDelta', () => {
    it('does not wrap', () => {
        expect(signedLinearDelta(2, 120)).toBe(-118);
        expect(signedLinearDelta(120, 2)).toBe(118);
    });
});

describe('tile helpers', () => {
    it('detects tile centres', () => {
        expect(isOnTileCenter({ x: 8, y: 12 }, 4)).toBe(true);
        expect(isOnTileCenter({ x: 9, y: 12 }, 4)).toBe(false);
        expect(isOnTileCenter({ x: 8, y: 13 }, 4)).toBe(false);
    });

    it('converts between absolute and tile coordinates', () => {
        expect(toTilePosition({ x: 9, y: 15 }, 4)).toEqual({ x: 2, y: 3 });
        expect(toAbsolutePosition({ x: 2, y: 3 }, 4)).toEqual({ x: 8, y: 12 });
    });

    it('checks grid bounds', () => {
        expect(isWithinGrid({ x: 0, y: 0 }, 28, 32)).toBe(true);
        expect(isWithinGrid({ x: 27, y: 31 }, 28, 32)).toBe(true);
        expect(isWithinGrid({ x: 28, y: 0 }, 28, 32)).toBe(false);
        expect(isWithinGrid({ x: 0, y: -1 }, 28, 32)).toBe(false);
    });
});
