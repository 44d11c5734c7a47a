import { describe, it, expect } from 'vitest';
import { PlaybackSynchronizer } from './PlaybackSynchronizer';
import { WordIndexBuilder } from './WordIndexBuilder';
import { PlainTextNormalizer } from '../parsers/PlainTextNormalizer';

describe('PlaybackSynchronizer', () => {
    const sync = new PlaybackSynchronizer();
    // one@1000, two@2000, three@3000, total 4000
    const index = new WordIndexBuilder().build({
        normalized: new PlainTextNormalizer().normalize('one two three'),
        anchors: [
            { normalizedOffset: 0, audioTime: 1000 },
            { normalizedOffset: 4, audioTime: 2000 },
            { normalizedOffset: 8, audioTime: 3000 }
        ],
        totalDurationMs: 4000
    });

    it('should find correct word using binary search', () => {
        // Before first word
        expect(sync.findWordIndex(index, 0)).toBe(-1);
        expect(sync.findWordIndex(index, 999)).toBe(-1);

        // Exact match
        expect(sync.findWordIndex(index, 1000)).toBe(0);

        // Between words
        expect(sync.findWordIndex(index, 1500)).toBe(0);
        expect(sync.findWordIndex(index, 2999)).toBe(1);

        // Last word and beyond
        expect(sync.findWordIndex(index, 3000)).toBe(2);
        expect(sync.findWordIndex(index, 5000)).toBe(2);
    });

    it('should calculate progress', () => {
        const word = index.words[0]; // 1000 - 2000

        expect(sync.calculateWordProgress(word, 1000)).toBe(0);
        expect(sync.calculateWordProgress(word, 1500)).toBe(0.5);
        expect(sync.calculateWordProgress(word, 2000)).toBe(1);
        expect(sync.calculateWordProgress(word, 500)).toBe(0);
    });

    it('should look up word start times', () => {
        expect(sync.timeForWord(index, 1)).toBe(2000);
        expect(() => sync.timeForWord(index, 3)).toThrow(RangeError);
        expect(() => sync.timeForWord(index, -1)).toThrow(RangeError);
    });

    it('should find the word at a source offset', () => {
        expect(sync.findWordAtOriginalOffset(index, 5)).toBe(1);
        expect(sync.findWordAtOriginalOffset(index, 12)).toBe(2);
        expect(sync.findWordAtOriginalOffset(index, 3)).toBe(-1);
    });
});
