import type { WordEntry, WordIndex } from "../models/WordTimeline";
import { isWhitespace } from "../utils/TextPatterns";

export interface CaptionCue {
    /** 1-based, as in SRT. */
    index: number;

    /** Milliseconds. */
    start: number;
    end: number;

    text: string;
}

const SENTENCE_PUNCTUATION = /[.!?…。！？]/;

function pad(num: number, size = 2) {
    return String(num).padStart(size, '0');
}

function formatTime(ms: number, separator: string): string {
    const total = Math.max(0, Math.floor(ms));
    const milli = total % 1000;
    const totalSeconds = Math.floor(total / 1000);
    const s = totalSeconds % 60;
    const m = Math.floor(totalSeconds / 60) % 60;
    const h = Math.floor(totalSeconds / 3600);
    return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(milli, 3)}`;
}

/**
 * Groups timed words into subtitle cues and renders them as SRT or WebVTT.
 */
export class CaptionService {
    /**
     * A cue ends after sentence punctuation, at a line break, or before it
     * would grow past `maxChars`.
     */
    public buildCues(index: WordIndex, maxChars = 64): CaptionCue[] {
        const cues: CaptionCue[] = [];
        const words = index.words;
        let first: WordEntry | null = null;
        let last: WordEntry | null = null;

        const close = () => {
            if (!first || !last) return;
            cues.push({
                index: cues.length + 1,
                start: first.audioStart,
                end: last.audioEnd,
                text: this.cueText(index, first, last)
            });
            first = null;
            last = null;
        };

        words.forEach((word, i) => {
            if (first && this.cueText(index, first, word).length > maxChars) close();
            if (!first) first = word;
            last = word;

            const nextStart = i + 1 < words.length ? words[i + 1].normalizedRange.start : index.text.length;
            const gap = index.text.slice(word.normalizedRange.end, nextStart);
            if (SENTENCE_PUNCTUATION.test(gap) || gap.includes("\n")) close();
        });
        close();

        return cues;
    }

    public toSrt(cues: CaptionCue[]): string {
        if (cues.length === 0) return "";
        return cues
            .map(cue => `${cue.index}\n${formatTime(cue.start, ",")} --> ${formatTime(cue.end, ",")}\n${cue.text}`)
            .join("\n\n") + "\n";
    }

    public toVtt(cues: CaptionCue[]): string {
        const body = cues
            .map(cue => `${formatTime(cue.start, ".")} --> ${formatTime(cue.end, ".")}\n${cue.text}`)
            .join("\n\n");
        return body ? `WEBVTT\n\n${body}\n` : "WEBVTT\n";
    }

    // Words plus the punctuation attached to the last one, whitespace collapsed
    private cueText(index: WordIndex, first: WordEntry, last: WordEntry): string {
        let end = last.normalizedRange.end;
        while (end < index.text.length && !isWhitespace(index.text[end])) end++;
        return index.text.slice(first.normalizedRange.start, end).replace(/\s+/g, " ");
    }
}
