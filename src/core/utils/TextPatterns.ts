/**
 * Character classes shared by the normalizers, the splitter and the tokenizer.
 */

/** Pictographs, skin-tone modifiers, flags, keycaps and their joiners. */
export const EMOJI_REGEX = /[\p{Extended_Pictographic}\p{Emoji_Modifier}\p{Regional_Indicator}\u200D\uFE0F\u20E3]/u;

/** Letters/digits, allowing inner apostrophes, hyphens and periods ("don't", "e-mail", "3.14"). */
export const WORD_REGEX = /[\p{L}\p{N}\p{M}]+(?:['’.\-][\p{L}\p{N}\p{M}]+)*/gu;

const WHITESPACE_REGEX = /\s/;
const WORD_CHAR_REGEX = /[\p{L}\p{N}]/u;
const ASCII_PUNCTUATION_REGEX = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/;

export function isWhitespace(ch: string | undefined): boolean {
    return ch !== undefined && WHITESPACE_REGEX.test(ch);
}

export function isWordChar(ch: string | undefined): boolean {
    return ch !== undefined && WORD_CHAR_REGEX.test(ch);
}

export function isAsciiPunctuation(ch: string | undefined): boolean {
    return ch !== undefined && ASCII_PUNCTUATION_REGEX.test(ch);
}

/**
 * Length in code units of the emoji code point at `index`, or 0.
 */
export function emojiWidthAt(text: string, index: number): number {
    const cp = text.codePointAt(index);
    if (cp === undefined) return 0;
    const ch = String.fromCodePoint(cp);
    return EMOJI_REGEX.test(ch) ? ch.length : 0;
}

export interface WordToken {
    text: string;
    start: number;
    end: number;
}

export function tokenizeWords(text: string): WordToken[] {
    const tokens: WordToken[] = [];
    for (const match of text.matchAll(WORD_REGEX)) {
        const start = match.index ?? 0;
        tokens.push({ text: match[0], start, end: start + match[0].length });
    }
    return tokens;
}
