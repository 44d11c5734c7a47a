import { describe, it, expect } from 'vitest';
import { CaptionService } from './CaptionService';
import { WordIndexBuilder } from './WordIndexBuilder';
import { PlainTextNormalizer } from '../parsers/PlainTextNormalizer';

function uniformIndex(text: string, totalDurationMs: number) {
    return new WordIndexBuilder().build({
        normalized: new PlainTextNormalizer().normalize(text),
        anchors: [],
        totalDurationMs
    });
}

describe('CaptionService', () => {
    const captions = new CaptionService();

    it('should break cues after sentences', () => {
        const cues = captions.buildCues(uniformIndex('Hello world. Goodbye now.', 4000));

        expect(cues).toEqual([
            { index: 1, start: 0, end: 2000, text: 'Hello world.' },
            { index: 2, start: 2000, end: 4000, text: 'Goodbye now.' }
        ]);
    });

    it('should keep cues within the length limit', () => {
        const cues = captions.buildCues(uniformIndex('aaa bbb ccc', 3000), 7);
        expect(cues.map(c => c.text)).toEqual(['aaa bbb', 'ccc']);
        expect(cues[1].start).toBe(2000);
    });

    it('should break cues at line breaks', () => {
        const cues = captions.buildCues(uniformIndex('first line\nsecond line', 4000));
        expect(cues.map(c => c.text)).toEqual(['first line', 'second line']);
    });

    it('should render SRT', () => {
        const cues = captions.buildCues(uniformIndex('Hello world. Goodbye now.', 4000));
        expect(captions.toSrt(cues)).toBe(
            '1\n00:00:00,000 --> 00:00:02,000\nHello world.\n\n' +
            '2\n00:00:02,000 --> 00:00:04,000\nGoodbye now.\n'
        );
    });

    it('should render WebVTT', () => {
        const cues = [{ index: 1, start: 3_723_456, end: 3_724_000, text: 'Late cue' }];
        expect(captions.toVtt(cues)).toBe('WEBVTT\n\n01:02:03.456 --> 01:02:04.000\nLate cue\n');
    });

    it('should render empty documents', () => {
        expect(captions.toSrt([])).toBe('');
        expect(captions.toVtt([])).toBe('WEBVTT\n');
    });
});
