import type { TextRange } from "./SpeechData";

/**
 * A single spoken word with its audio timing.
 */
export interface WordEntry {
    /** Global 0-based position. */
    wordIndex: number;

    text: string;

    /** Span in the spoken text. */
    normalizedRange: TextRange;

    /** Span in the source document (may be zero-width for inserted words). */
    originalRange: TextRange;

    /** Absolute start in ms. Non-decreasing across entries. */
    audioStart: number;

    /** Start of the next word, or the total duration for the last one. */
    audioEnd: number;

    /** True when the start was computed rather than reported by the backend. */
    interpolated: boolean;
}

/**
 * Word timing for one generation. Frozen once built; a new text, voice
 * or rate produces a new index.
 */
export interface WordIndex {
    generation: number;

    /** Spoken text the word ranges refer to. */
    text: string;

    words: readonly WordEntry[];

    totalDurationMs: number;

    /** Audio start of every segment, in segment order. */
    segmentStarts: readonly number[];
}

/**
 * Transient playback view held by the sync engine.
 */
export interface PlaybackState {
    currentAudioTime: number;

    /** -1 while nothing is highlighted. */
    lastReportedWordIndex: number;

    isPlaying: boolean;

    rate: number;
}
