import { describe, it, expect } from 'vitest';
import { SegmentSplitter } from './SegmentSplitter';

describe('SegmentSplitter', () => {
    const splitter = new SegmentSplitter();

    it('should find sentences without surrounding whitespace', () => {
        const spans = splitter.findSentences('  One two. "Three?" Four\nFive ');
        expect(spans).toEqual([
            { start: 2, end: 10 },
            { start: 11, end: 19 },
            { start: 20, end: 24 },
            { start: 25, end: 29 }
        ]);
    });

    it('should not end a sentence inside a number or abbreviation without whitespace', () => {
        expect(splitter.findSentences('Pi is 3.14 today.')).toEqual([{ start: 0, end: 17 }]);
    });

    it('should pack sentences greedily', () => {
        const text = 'One two three. Four five six. Seven.';

        const tight = splitter.split(text, 20);
        expect(tight.map(s => s.text)).toEqual(['One two three.', 'Four five six.', 'Seven.']);
        expect(tight.map(s => s.normalizedOffsetStart)).toEqual([0, 15, 30]);
        expect(tight.map(s => s.id)).toEqual([0, 1, 2]);

        const loose = splitter.split(text, 21);
        expect(loose.map(s => s.text)).toEqual(['One two three.', 'Four five six. Seven.']);
    });

    it('should keep everything in one segment when it fits', () => {
        const text = 'Short text. Another one.';
        const segments = splitter.split(text, 2000);
        expect(segments).toEqual([{ id: 0, text, normalizedOffsetStart: 0 }]);
    });

    it('should prefer a clause boundary when cutting a long sentence', () => {
        const text = 'alpha beta gamma, delta epsilon zeta';
        const segments = splitter.split(text, 24);
        expect(segments.map(s => s.text)).toEqual(['alpha beta gamma,', 'delta epsilon zeta']);
    });

    it('should cut at the last whitespace when there is no clause boundary', () => {
        const segments = splitter.split('aaa bbb ccc ddd', 9);
        expect(segments.map(s => s.text)).toEqual(['aaa bbb', 'ccc ddd']);
    });

    it('should never cut inside a word', () => {
        const segments = splitter.split('abcdefghij klm', 4);
        expect(segments.map(s => s.text)).toEqual(['abcdefghij', 'klm']);
        expect(segments[1].normalizedOffsetStart).toBe(11);
    });

    it('should reproduce the text from its segments', () => {
        const text = 'First line here.\nSecond line, which is a little longer than the rest.\n\nThird? Yes! Done.';
        const segments = splitter.split(text, 25);

        segments.forEach(segment => {
            expect(text.slice(segment.normalizedOffsetStart, segment.normalizedOffsetStart + segment.text.length))
                .toBe(segment.text);
        });

        for (let i = 1; i < segments.length; i++) {
            const prevEnd = segments[i - 1].normalizedOffsetStart + segments[i - 1].text.length;
            expect(text.slice(prevEnd, segments[i].normalizedOffsetStart).trim()).toBe('');
        }

        const words = segments.flatMap(s => s.text.split(/\s+/));
        expect(words).toEqual(text.split(/\s+/));
    });

    it('should return nothing for blank text', () => {
        expect(splitter.split(' \n ', 10)).toEqual([]);
    });

    it('should reject a non-positive limit', () => {
        expect(() => splitter.split('text', 0)).toThrow(RangeError);
        expect(() => splitter.split('text', 2.5)).toThrow(RangeError);
    });
});
