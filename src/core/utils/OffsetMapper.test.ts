import { describe, it, expect } from 'vitest';
import { findRangeIndex, toOriginalOffset, toOriginalRange, verifyOffsetMap } from './OffsetMapper';
import type { OffsetRange } from '../models/SpeechData';

// "abc" copied, a collapsed run of three spaces, an inserted cue, "def" copied
const MAP: OffsetRange[] = [
    { normalizedStart: 0, normalizedEnd: 3, originalStart: 0, originalEnd: 3 },
    { normalizedStart: 3, normalizedEnd: 4, originalStart: 3, originalEnd: 6 },
    { normalizedStart: 4, normalizedEnd: 8, originalStart: 6, originalEnd: 6 },
    { normalizedStart: 8, normalizedEnd: 11, originalStart: 6, originalEnd: 9 }
];

describe('OffsetMapper', () => {
    it('should find the covering range', () => {
        expect(findRangeIndex(MAP, 0)).toBe(0);
        expect(findRangeIndex(MAP, 3)).toBe(1);
        expect(findRangeIndex(MAP, 10)).toBe(3);
        expect(findRangeIndex(MAP, 11)).toBe(-1);
        expect(findRangeIndex(MAP, -1)).toBe(-1);
    });

    it('should skip zero-width ranges', () => {
        const map: OffsetRange[] = [
            { normalizedStart: 0, normalizedEnd: 0, originalStart: 0, originalEnd: 2 },
            { normalizedStart: 0, normalizedEnd: 3, originalStart: 2, originalEnd: 5 }
        ];
        expect(findRangeIndex(map, 0)).toBe(1);
        expect(toOriginalOffset(map, 1)).toBe(3);
    });

    it('should map single offsets', () => {
        expect(toOriginalOffset(MAP, 1)).toBe(1);
        expect(toOriginalOffset(MAP, 3)).toBe(3);
        expect(toOriginalOffset(MAP, 5)).toBe(6);
        expect(toOriginalOffset(MAP, 9)).toBe(7);
        expect(toOriginalOffset(MAP, 11)).toBe(9);
        expect(toOriginalOffset([], 0)).toBe(0);
    });

    it('should map ranges', () => {
        expect(toOriginalRange(MAP, 8, 11)).toEqual({ start: 6, end: 9 });
        expect(toOriginalRange(MAP, 0, 11)).toEqual({ start: 0, end: 9 });
        expect(toOriginalRange(MAP, 4, 8)).toEqual({ start: 6, end: 6 });
        expect(toOriginalRange(MAP, 2, 2)).toEqual({ start: 2, end: 2 });
    });

    it('should accept a sound map', () => {
        expect(verifyOffsetMap(MAP, 11)).toEqual([]);
        expect(verifyOffsetMap([], 0)).toEqual([]);
    });

    it('should report broken maps', () => {
        expect(verifyOffsetMap(MAP, 12)).toEqual(['map covers 11 of 12 characters']);

        expect(verifyOffsetMap([
            { normalizedStart: 0, normalizedEnd: 2, originalStart: 0, originalEnd: 2 },
            { normalizedStart: 3, normalizedEnd: 4, originalStart: 2, originalEnd: 3 }
        ], 4)).toEqual(['range 1 starts at 3, expected 2']);

        expect(verifyOffsetMap([
            { normalizedStart: 0, normalizedEnd: 2, originalStart: 4, originalEnd: 6 },
            { normalizedStart: 2, normalizedEnd: 4, originalStart: 0, originalEnd: 2 }
        ], 4)).toEqual(['range 1 goes back in the source (0 < 6)']);
    });
});
