import type { Anchor, NormalizedText } from "../models/SpeechData";
import type { WordEntry, WordIndex } from "../models/WordTimeline";
import { Logger } from "../utils/Logger";
import { toOriginalRange } from "../utils/OffsetMapper";
import { tokenizeWords } from "../utils/TextPatterns";

export interface WordIndexInput {
    normalized: NormalizedText;

    /** Global anchors; sorted here by offset. */
    anchors: readonly Anchor[];

    totalDurationMs: number;

    segmentStarts?: readonly number[];

    generation?: number;
}

function interpolate(prev: Anchor, next: Anchor, offset: number): number {
    const span = next.normalizedOffset - prev.normalizedOffset;
    if (span <= 0) return prev.audioTime;
    const ratio = (offset - prev.normalizedOffset) / span;
    return prev.audioTime + (next.audioTime - prev.audioTime) * ratio;
}

/**
 * Turns anchors into one timing entry per spoken word.
 *
 * A word with an anchor inside its span takes that anchor's time; other words
 * are placed linearly by character offset between the surrounding anchors,
 * with virtual anchors at (0, 0) and (end of text, total duration).
 */
export class WordIndexBuilder {
    public build(input: WordIndexInput): WordIndex {
        const { spokenText, offsetMap } = input.normalized;
        const tokens = tokenizeWords(spokenText);
        const anchors = [...input.anchors].sort(
            (a, b) => a.normalizedOffset - b.normalizedOffset || a.audioTime - b.audioTime
        );

        const reported = Number.isFinite(input.totalDurationMs) ? Math.max(0, input.totalDurationMs) : 0;
        const total = anchors.reduce((max, anchor) => Math.max(max, anchor.audioTime), reported);

        const starts: number[] = [];
        const interpolated: boolean[] = [];

        if (anchors.length === 0) {
            const slice = tokens.length > 0 ? total / tokens.length : 0;
            tokens.forEach((_, i) => {
                starts.push(i * slice);
                interpolated.push(true);
            });
        } else {
            const head: Anchor = { normalizedOffset: 0, audioTime: 0 };
            const tail: Anchor = { normalizedOffset: spokenText.length, audioTime: total };
            let next = 0;

            for (const token of tokens) {
                while (next < anchors.length && anchors[next].normalizedOffset < token.start) next++;

                const candidate = anchors[next];
                if (candidate && candidate.normalizedOffset < token.end) {
                    starts.push(candidate.audioTime);
                    interpolated.push(false);
                    continue;
                }

                const prev = next > 0 ? anchors[next - 1] : head;
                starts.push(interpolate(prev, candidate ?? tail, token.start));
                interpolated.push(true);
            }
        }

        // Anchors are trusted to be monotonic; clamp anyway so the index always is.
        let clamped = 0;
        let floor = 0;
        for (let i = 0; i < starts.length; i++) {
            const value = Math.min(Math.max(starts[i], floor), total);
            if (value !== starts[i]) clamped++;
            starts[i] = value;
            floor = value;
        }
        if (clamped > 0) {
            Logger.warn(`[WordIndexBuilder] Clamped ${clamped} word start times into order`);
        }

        const words: WordEntry[] = tokens.map((token, i) =>
            Object.freeze({
                wordIndex: i,
                text: token.text,
                normalizedRange: Object.freeze({ start: token.start, end: token.end }),
                originalRange: Object.freeze(toOriginalRange(offsetMap, token.start, token.end)),
                audioStart: starts[i],
                audioEnd: i + 1 < starts.length ? starts[i + 1] : total,
                interpolated: interpolated[i]
            })
        );

        const direct = interpolated.filter(value => !value).length;
        Logger.info(`[WordIndexBuilder] Indexed ${words.length} words (${direct} anchored) over ${Math.round(total)}ms`);

        return Object.freeze({
            generation: input.generation ?? 0,
            text: spokenText,
            words: Object.freeze(words),
            totalDurationMs: total,
            segmentStarts: Object.freeze([...(input.segmentStarts ?? [])])
        });
    }
}
