import type { OffsetMap, OffsetRange, TextRange } from "../models/SpeechData";

function isCopied(range: OffsetRange): boolean {
    const width = range.normalizedEnd - range.normalizedStart;
    return width > 0 && width === range.originalEnd - range.originalStart;
}

/**
 * Index of the range covering normalized offset `index`, or -1.
 * Binary search on `normalizedStart`; zero-width ranges never cover anything.
 */
export function findRangeIndex(map: OffsetMap, index: number): number {
    let low = 0;
    let high = map.length - 1;
    let result = -1;

    while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        if (map[mid].normalizedStart <= index) {
            result = mid;
            low = mid + 1;
        } else {
            high = mid - 1;
        }
    }

    if (result === -1) return -1;
    return map[result].normalizedEnd > index ? result : -1;
}

/**
 * Source position of the spoken character at `index`.
 * Characters of inserted or collapsed text resolve to the start of their source span.
 */
export function toOriginalOffset(map: OffsetMap, index: number): number {
    const found = findRangeIndex(map, index);
    if (found === -1) {
        const last = map[map.length - 1];
        return last ? last.originalEnd : 0;
    }
    const range = map[found];
    return isCopied(range) ? range.originalStart + (index - range.normalizedStart) : range.originalStart;
}

/**
 * Source position just after the spoken character at `endExclusive - 1`.
 */
export function toOriginalEnd(map: OffsetMap, endExclusive: number): number {
    const found = findRangeIndex(map, endExclusive - 1);
    if (found === -1) return toOriginalOffset(map, endExclusive);
    const range = map[found];
    return isCopied(range) ? range.originalStart + (endExclusive - range.normalizedStart) : range.originalEnd;
}

/**
 * Maps a half-open spoken-text range to the source document.
 */
export function toOriginalRange(map: OffsetMap, start: number, end: number): TextRange {
    const originalStart = toOriginalOffset(map, start);
    if (end <= start) return { start: originalStart, end: originalStart };
    return { start: originalStart, end: Math.max(originalStart, toOriginalEnd(map, end)) };
}

/**
 * Lists violations of the offset-map invariants; empty when the map is sound.
 * Checked: sorted, contiguous and non-overlapping in spoken-text space, every
 * spoken character covered exactly once, source positions non-decreasing.
 */
export function verifyOffsetMap(map: OffsetMap, spokenLength: number): string[] {
    const problems: string[] = [];
    let covered = 0;
    let lastOriginal = 0;

    map.forEach((range, i) => {
        if (range.normalizedEnd < range.normalizedStart || range.originalEnd < range.originalStart) {
            problems.push(`range ${i} is inverted`);
        }
        if (range.normalizedStart !== covered) {
            problems.push(`range ${i} starts at ${range.normalizedStart}, expected ${covered}`);
        }
        if (range.originalStart < lastOriginal) {
            problems.push(`range ${i} goes back in the source (${range.originalStart} < ${lastOriginal})`);
        }
        covered = Math.max(covered, range.normalizedEnd);
        lastOriginal = Math.max(lastOriginal, range.originalEnd);
    });

    if (covered !== spokenLength) {
        problems.push(`map covers ${covered} of ${spokenLength} characters`);
    }
    return problems;
}
