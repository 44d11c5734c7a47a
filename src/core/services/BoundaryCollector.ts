import { AlignmentError } from "../errors/SpeechErrors";
import type { Anchor, BoundaryHint, Segment, SegmentOutcome } from "../models/SpeechData";
import { Logger } from "../utils/Logger";

/**
 * Global anchor timeline of one generation.
 */
export interface CollectedTimeline {
    /** Ordered by text offset and by audio time. */
    anchors: Anchor[];

    /** Audio start of each segment, in segment order. */
    segmentStarts: number[];

    /** Reported audio length of each segment (0 for failed segments). */
    segmentDurations: number[];

    totalDurationMs: number;

    /** Recoverable timing contradictions that were clamped. */
    alignmentErrors: AlignmentError[];

    /** Ids of segments whose synthesis failed. */
    failedSegments: number[];
}

function outcomeSegmentId(outcome: SegmentOutcome): number {
    return outcome.ok ? outcome.timing.segmentId : outcome.segmentId;
}

/**
 * Merges per-segment boundary hints into one timeline.
 *
 * Hints are an unordered multiset: they are sorted, de-duplicated and
 * filtered here, so the result does not depend on the order in which
 * segments or hints arrived.
 */
export class BoundaryCollector {
    public collect(segments: readonly Segment[], outcomes: readonly SegmentOutcome[]): CollectedTimeline {
        const byId = this.indexOutcomes(outcomes);
        const ordered = [...segments].sort((a, b) => a.id - b.id);

        const timeline: CollectedTimeline = {
            anchors: [],
            segmentStarts: [],
            segmentDurations: [],
            totalDurationMs: 0,
            alignmentErrors: [],
            failedSegments: []
        };

        // Where the previous segment should end by its own report, and where its evidence ends.
        let reportedEnd = 0;
        let actualEnd = 0;

        for (const segment of ordered) {
            const outcome = byId.get(segment.id);
            const timing = outcome?.ok ? outcome.timing : null;
            if (!timing) timeline.failedSegments.push(segment.id);

            let duration = timing ? timing.durationMs : 0;
            if (!Number.isFinite(duration) || duration < 0) {
                this.recordError(timeline, new AlignmentError(`invalid duration ${duration}ms treated as 0`, segment.id));
                duration = 0;
            }

            let start = reportedEnd;
            if (start < actualEnd) {
                this.recordError(
                    timeline,
                    new AlignmentError(
                        `starts at ${start}ms before the previous segment ends at ${actualEnd}ms; clamped`,
                        segment.id
                    )
                );
                start = actualEnd;
            }

            const hints = timing ? this.prepareHints(segment, timing.hints) : [];
            for (const hint of hints) {
                timeline.anchors.push({
                    normalizedOffset: segment.normalizedOffsetStart + hint.chunkRelativeTextOffset,
                    audioTime: start + hint.chunkRelativeAudioTime
                });
            }

            const lastHintTime = hints.length > 0 ? hints[hints.length - 1].chunkRelativeAudioTime : 0;
            timeline.segmentStarts.push(start);
            timeline.segmentDurations.push(duration);

            reportedEnd = start + duration;
            actualEnd = start + Math.max(duration, lastHintTime);
        }

        timeline.totalDurationMs = Math.max(reportedEnd, actualEnd);

        Logger.debug(
            `[BoundaryCollector] ${timeline.anchors.length} anchors over ${ordered.length} segments, ` +
            `${timeline.failedSegments.length} failed, total ${timeline.totalDurationMs}ms`
        );

        return timeline;
    }

    /**
     * Sorts a segment's hints by text offset (ties by emission order), keeps the
     * first hint per offset and drops hints that are out of range or go back in time.
     */
    public prepareHints(segment: Segment, hints: readonly BoundaryHint[]): BoundaryHint[] {
        const candidates = hints
            .map((hint, order) => ({ hint, order }))
            .filter(({ hint }) =>
                hint.segmentId === segment.id &&
                Number.isFinite(hint.chunkRelativeTextOffset) &&
                Number.isFinite(hint.chunkRelativeAudioTime) &&
                hint.chunkRelativeTextOffset >= 0 &&
                hint.chunkRelativeTextOffset < segment.text.length &&
                hint.chunkRelativeAudioTime >= 0
            )
            .sort((a, b) =>
                a.hint.chunkRelativeTextOffset - b.hint.chunkRelativeTextOffset || a.order - b.order
            );

        const kept: BoundaryHint[] = [];
        for (const { hint } of candidates) {
            const last = kept[kept.length - 1];
            if (last && last.chunkRelativeTextOffset === hint.chunkRelativeTextOffset) continue;
            if (last && hint.chunkRelativeAudioTime < last.chunkRelativeAudioTime) continue;
            kept.push(hint);
        }

        const dropped = hints.length - kept.length;
        if (dropped > 0) {
            Logger.debug(`[BoundaryCollector] Segment ${segment.id}: dropped ${dropped} of ${hints.length} hints`);
        }
        return kept;
    }

    private indexOutcomes(outcomes: readonly SegmentOutcome[]): Map<number, SegmentOutcome> {
        const byId = new Map<number, SegmentOutcome>();
        for (const outcome of outcomes) {
            const id = outcomeSegmentId(outcome);
            const existing = byId.get(id);
            // A success always wins over a failure reported for the same segment.
            if (!existing || (!existing.ok && outcome.ok)) {
                byId.set(id, outcome);
            } else {
                Logger.warn(`[BoundaryCollector] Ignoring duplicate outcome for segment ${id}`);
            }
        }
        return byId;
    }

    private recordError(timeline: CollectedTimeline, error: AlignmentError) {
        timeline.alignmentErrors.push(error);
        Logger.warn(`[BoundaryCollector] ${error.message}`);
    }
}
