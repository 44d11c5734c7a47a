import type { Segment, TextRange } from "../models/SpeechData";
import { isWhitespace } from "../utils/TextPatterns";

const SENTENCE_END = new Set([".", "!", "?", "…", "。", "！", "？"]);
const CLOSERS = new Set(["\"", "'", "”", "’", ")", "]", "»"]);
const CLAUSE_END = new Set([",", ";", ":", "—", "–"]);

/**
 * Cuts spoken text into synthesis-sized segments.
 *
 * Greedy single pass: sentences are packed into the current segment until the
 * next one would overflow `maxChars`. Same input, same segments.
 */
export class SegmentSplitter {
    /**
     * @param text Normalized spoken text.
     * @param maxChars Backend limit per request.
     * @returns Non-empty segments; each `text` is an exact slice of `text`.
     */
    public split(text: string, maxChars: number): Segment[] {
        if (!Number.isInteger(maxChars) || maxChars < 1) {
            throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
        }

        const segments: Segment[] = [];
        let current: TextRange | null = null;

        const push = (range: TextRange) => {
            segments.push({
                id: segments.length,
                text: text.slice(range.start, range.end),
                normalizedOffsetStart: range.start
            });
        };

        for (const sentence of this.findSentences(text)) {
            if (current && sentence.end - current.start <= maxChars) {
                current = { start: current.start, end: sentence.end };
                continue;
            }
            if (current) push(current);
            current = null;

            if (sentence.end - sentence.start <= maxChars) {
                current = sentence;
                continue;
            }

            const pieces = this.hardCut(text, sentence, maxChars);
            pieces.slice(0, -1).forEach(push);
            current = pieces[pieces.length - 1];
        }

        if (current) push(current);
        return segments;
    }

    /**
     * Sentence spans with surrounding whitespace excluded. A sentence ends after
     * terminal punctuation (and closing quotes) followed by whitespace, or at a newline.
     */
    public findSentences(text: string): TextRange[] {
        const sentences: TextRange[] = [];
        let start = -1;
        let lastVisible = -1;

        const close = () => {
            if (start !== -1) sentences.push({ start, end: lastVisible + 1 });
            start = -1;
        };

        for (let i = 0; i < text.length; i++) {
            const ch = text[i];
            if (isWhitespace(ch)) {
                if (ch === "\n") {
                    close();
                } else if (start !== -1 && this.endsSentence(text, lastVisible)) {
                    close();
                }
                continue;
            }
            if (start === -1) start = i;
            lastVisible = i;
        }
        close();

        return sentences;
    }

    private endsSentence(text: string, index: number): boolean {
        let i = index;
        while (i >= 0 && CLOSERS.has(text[i])) i--;
        return i >= 0 && SENTENCE_END.has(text[i]);
    }

    /**
     * Splits an over-long sentence. Prefers a clause boundary in the second half
     * of the window, then the last whitespace. A single word longer than the
     * window is kept whole.
     */
    private hardCut(text: string, sentence: TextRange, maxChars: number): TextRange[] {
        const pieces: TextRange[] = [];
        let start = sentence.start;

        while (sentence.end - start > maxChars) {
            const windowEnd = start + maxChars;
            let cut = -1;
            let clauseCut = -1;

            // `cut` is the end of the piece: the index of a whitespace char at or before windowEnd.
            for (let i = windowEnd; i > start; i--) {
                if (!isWhitespace(text[i])) continue;
                if (cut === -1) cut = i;
                if (CLAUSE_END.has(text[i - 1]) && i - start >= maxChars / 2) {
                    clauseCut = i;
                    break;
                }
            }

            if (clauseCut !== -1) cut = clauseCut;
            if (cut === -1) {
                // No whitespace in the window: extend to the end of the word.
                cut = windowEnd;
                while (cut < sentence.end && !isWhitespace(text[cut])) cut++;
            }

            let pieceEnd = cut;
            while (pieceEnd > start && isWhitespace(text[pieceEnd - 1])) pieceEnd--;
            pieces.push({ start, end: pieceEnd });

            start = cut;
            while (start < sentence.end && isWhitespace(text[start])) start++;
            if (start >= sentence.end) return pieces;
        }

        pieces.push({ start, end: sentence.end });
        return pieces;
    }
}
