import type { SynthesisError } from "../errors/SpeechErrors";

/**
 * One entry of the offset map between spoken text and the source document.
 * Offsets are UTF-16 code-unit indices.
 *
 * - Copied text: both spans have the same length, mapping is 1:1.
 * - Inserted text (hints, separators): zero-width original span.
 * - Removed markup: zero-width normalized span carrying the removed original span.
 * - Collapsed whitespace: short normalized span over a longer original span.
 */
export interface OffsetRange {
    normalizedStart: number;
    normalizedEnd: number;
    originalStart: number;
    originalEnd: number;
}

/** Sorted by `normalizedStart`, contiguous over the spoken text. */
export type OffsetMap = readonly OffsetRange[];

/** Half-open `[start, end)` range. */
export interface TextRange {
    start: number;
    end: number;
}

/**
 * Output of a text normalizer.
 */
export interface NormalizedText {
    /** The document as it was loaded. */
    originalText: string;

    /** Flat text handed to the synthesis backend. */
    spokenText: string;

    offsetMap: OffsetMap;
}

/**
 * One chunk of spoken text submitted to the synthesis backend.
 */
export interface Segment {
    /** 0-based position in the generation. */
    id: number;

    /** Exact slice of the spoken text, never empty. */
    text: string;

    /** Index of `text[0]` in the spoken text. */
    normalizedOffsetStart: number;
}

/**
 * Raw word-boundary event from the backend.
 * Not trusted to be ordered, complete or unique.
 */
export interface BoundaryHint {
    segmentId: number;

    /** Character offset into the segment text. */
    chunkRelativeTextOffset: number;

    /** Milliseconds from the start of the segment's audio. */
    chunkRelativeAudioTime: number;

    /** Word as the backend saw it (diagnostics only). */
    text?: string;

    /** Spoken length of the word in ms, when reported. */
    duration?: number;
}

/** Trusted (text offset, audio time) pair on the global timeline. */
export interface Anchor {
    normalizedOffset: number;
    audioTime: number;
}

/**
 * Successful synthesis of one segment.
 */
export interface SegmentTiming {
    segmentId: number;
    audio: Uint8Array;
    hints: BoundaryHint[];
    durationMs: number;

    /** Container type of `audio`. */
    mimeType?: string;
}

/**
 * Per-segment result. A failure is handled exactly like a success without hints.
 */
export type SegmentOutcome =
    | { ok: true; timing: SegmentTiming }
    | { ok: false; segmentId: number; error: SynthesisError };
