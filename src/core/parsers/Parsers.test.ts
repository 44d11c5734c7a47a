import { describe, it, expect } from 'vitest';
import { MarkdownNormalizer } from './MarkdownNormalizer';
import { PlainTextNormalizer } from './PlainTextNormalizer';
import { NormalizationError } from '../errors/SpeechErrors';
import { toOriginalRange, verifyOffsetMap } from '../utils/OffsetMapper';

describe('MarkdownNormalizer', () => {
    const normalizer = new MarkdownNormalizer();
    const bare = new MarkdownNormalizer({ contextHints: false });
    const spoken = (markdown: string) => normalizer.normalize(markdown).spokenText;

    it('should strip a small document', () => {
        const markdown = '# Hello world\n\nThis is **bold** and [a link](http://x.com).\n- item one\n- item two';
        const result = normalizer.normalize(markdown);

        expect(result.originalText).toBe(markdown);
        expect(result.spokenText).toBe('Title — Hello world\n\nThis is bold and a link.\nitem one\nitem two');
        expect(verifyOffsetMap(result.offsetMap, result.spokenText.length)).toEqual([]);
    });

    it('should map spoken words back to the source', () => {
        const markdown = '# Hello world\n\nThis is **bold** and [a link](http://x.com).';
        const result = normalizer.normalize(markdown);

        const link = result.spokenText.indexOf('link');
        expect(toOriginalRange(result.offsetMap, link, link + 4)).toEqual({ start: 39, end: 43 });

        const bold = result.spokenText.indexOf('bold');
        expect(markdown.slice(25, 29)).toBe('bold');
        expect(toOriginalRange(result.offsetMap, bold, bold + 4)).toEqual({ start: 25, end: 29 });

        // The inserted cue has no source text of its own
        expect(toOriginalRange(result.offsetMap, 0, 5)).toEqual({ start: 2, end: 2 });
    });

    it('should announce header levels', () => {
        expect(spoken('## Setup\n### Deep')).toBe('Section — Setup\n\nSubsection — Deep');
        expect(spoken('###### Tiny ##')).toBe('Subsection — Tiny');
        expect(bare.normalize('# Plain').spokenText).toBe('Plain');
    });

    it('should announce inline code', () => {
        expect(spoken('Use `npm test` now')).toBe('Use code snippet: npm test now');
        expect(bare.normalize('Use `npm test` now').spokenText).toBe('Use npm test now');
    });

    it('should replace fenced code blocks', () => {
        const markdown = 'Intro\n```js\nconst x = 1;\n```\nOutro';
        expect(spoken(markdown)).toBe('Intro\n\n(code block omitted)\n\nOutro');
        expect(bare.normalize(markdown).spokenText).toBe('Intro\n\nOutro');
    });

    it('should describe images', () => {
        expect(spoken('See ![a cat](cat.png) here')).toBe('See Image: a cat here');
        expect(spoken('![](x.png)')).toBe('Image');
        expect(bare.normalize('See ![a cat](cat.png) here').spokenText).toBe('See a cat here');
    });

    it('should remove emphasis but keep literal markers', () => {
        expect(spoken('***both*** and ~~gone~~')).toBe('both and gone');
        expect(spoken('snake_case_name')).toBe('snake_case_name');
        expect(spoken('2 * 3')).toBe('2 * 3');
        expect(spoken('a \\*literal\\* star')).toBe('a *literal* star');
    });

    it('should unwrap links, autolinks and footnotes', () => {
        expect(spoken('Read [the docs][ref] first')).toBe('Read the docs first');
        expect(spoken('Visit <https://example.com> today')).toBe('Visit https://example.com today');
        expect(spoken('Fact[^1] here')).toBe('Fact here');
    });

    it('should drop HTML tags and comments', () => {
        expect(spoken('Line one<br>Line two <b>bold</b>')).toBe('Line one Line two bold');
        expect(spoken('Keep <!-- hidden --> this')).toBe('Keep this');
    });

    it('should drop block markers', () => {
        expect(spoken('> quoted text')).toBe('quoted text');
        expect(spoken('1. first\n2) second')).toBe('first\nsecond');
        expect(spoken('- [x] done task')).toBe('done task');
        expect(spoken('Title\n===\nBody')).toBe('Title\n\nBody');
        expect(spoken('Above\n\n---\n\nBelow')).toBe('Above\n\nBelow');
    });

    it('should flatten tables', () => {
        expect(spoken('| a | b |\n|---|---|\n| 1 | 2 |')).toBe('a b\n\n1 2');
    });

    it('should remove emoji', () => {
        expect(spoken('I ❤️ cats')).toBe('I cats');
        expect(spoken('\u{1F44D}\u{1F3FD} ok')).toBe('ok');
    });

    it('should collapse whitespace', () => {
        expect(spoken('  hi  ')).toBe('hi');
        expect(spoken('one\r\ntwo')).toBe('one\ntwo');
        expect(spoken('a   b\n\n\n\nc')).toBe('a b\n\nc');
    });

    it('should return empty text for empty input', () => {
        const result = normalizer.normalize('');
        expect(result.spokenText).toBe('');
        expect(result.offsetMap).toEqual([]);
    });

    it('should read unbalanced markup literally', () => {
        expect(spoken('[not a link')).toBe('[not a link');
        expect(spoken('tick ` alone')).toBe('tick ` alone');
    });

    it('should reject lone surrogates', () => {
        expect(() => normalizer.normalize('ab\uD800')).toThrow(NormalizationError);
        expect(() => normalizer.normalize('ab\uD800')).toThrow('[Normalize] Lone UTF-16 surrogate at offset 2');
    });

    it('should produce a sound offset map for mixed documents', () => {
        const documents = [
            '# T\n\n> quote with `code` and ![img](a.png)\n\n```\nblock\n```\n| x | y |\n|---|---|\n| 1 | 2 |',
            'Text with <span>inline</span> html, **strong _nested_ text** and a [link [with] brackets](u(1)).',
            '\n\n   \n',
            'Emoji 🎉 at the end 🎉',
            'Setext\n------\n* star item\n+ plus item\n\n***\n\n1) one'
        ];

        for (const markdown of documents) {
            const result = normalizer.normalize(markdown);
            expect(verifyOffsetMap(result.offsetMap, result.spokenText.length)).toEqual([]);
        }
    });
});

describe('PlainTextNormalizer', () => {
    const normalizer = new PlainTextNormalizer();

    it('should keep markup and collapse whitespace', () => {
        expect(normalizer.normalize('# Keep *this*  \n\n\n text \u{1F389}').spokenText).toBe('# Keep *this*\n\ntext');
    });

    it('should map characters one to one', () => {
        const result = normalizer.normalize('one  two');
        expect(result.spokenText).toBe('one two');
        expect(toOriginalRange(result.offsetMap, 4, 7)).toEqual({ start: 5, end: 8 });
        expect(verifyOffsetMap(result.offsetMap, result.spokenText.length)).toEqual([]);
    });

    it('should reject lone surrogates', () => {
        expect(() => normalizer.normalize('\uDC00')).toThrow(NormalizationError);
    });
});
