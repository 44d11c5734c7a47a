import { DEFAULT_CONFIG, type SpeechConfig } from "../config/SpeechConfig";
import { AlignmentError, SynthesisError } from "../errors/SpeechErrors";
import type { SynthesisBackend, SynthesisResult } from "../interfaces/SynthesisBackend";
import type { TextNormalizer } from "../interfaces/TextNormalizer";
import type { BoundaryHint, NormalizedText, Segment, SegmentOutcome, SegmentTiming } from "../models/SpeechData";
import type { WordIndex } from "../models/WordTimeline";
import { MarkdownNormalizer } from "../parsers/MarkdownNormalizer";
import { PlainTextNormalizer } from "../parsers/PlainTextNormalizer";
import { Logger } from "../utils/Logger";
import { tokenizeWords } from "../utils/TextPatterns";
import { resolveVoice, speedToRate } from "../utils/VoiceOptions";
import { AudioMetadataService } from "./AudioMetadataService";
import { BoundaryCollector } from "./BoundaryCollector";
import { SegmentSplitter } from "./SegmentSplitter";
import { WordIndexBuilder } from "./WordIndexBuilder";

const DEFAULT_MIME_TYPE = "audio/mpeg";
const MAX_CONCURRENCY = 8;
const MAX_RETRY_DELAY_MS = 8000;

export interface GenerateOptions {
    /** Voice alias or full voice id. */
    voice?: string;

    /** Speed multiplier in [0, 2]. */
    speed?: number;

    /** Set to false to read the text without Markdown handling. */
    markdown?: boolean;
}

export interface GenerationProgress {
    generation: number;
    completed: number;
    total: number;
    segmentId: number;
    ok: boolean;
}

export interface GenerationResult {
    generation: number;
    normalized: NormalizedText;
    segments: Segment[];

    /** In segment order. */
    outcomes: SegmentOutcome[];

    /** Encoded audio per segment, in segment order; empty for failed segments. */
    audio: Uint8Array[];

    mimeType: string;
    index: WordIndex;
    segmentDurations: number[];
    failedSegments: number[];
    alignmentErrors: AlignmentError[];
    voice: string;
    rate: string;
}

export interface SpeechGeneratorDeps {
    metadata?: AudioMetadataService;

    /** Replaces the retry backoff timer. */
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

interface RequestContext {
    generation: number;
    voice: string;
    rate: string;
    speed: number;
    signal: AbortSignal;
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal.removeEventListener("abort", done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal.addEventListener("abort", done, { once: true });
    });
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one generation end to end: normalize, split, synthesize with bounded
 * concurrency, collect boundaries, build the word index.
 *
 * Every generation owns a token; starting a new one (or calling `cancel`)
 * aborts in-flight requests of the previous one, and its result is dropped.
 */
export class SpeechGenerator {
    private readonly splitter = new SegmentSplitter();
    private readonly collector = new BoundaryCollector();
    private readonly builder = new WordIndexBuilder();
    private readonly metadata: AudioMetadataService;
    private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

    private generation = 0;
    private controller: AbortController | null = null;

    constructor(
        private readonly backend: SynthesisBackend,
        private readonly config: SpeechConfig = DEFAULT_CONFIG,
        deps: SpeechGeneratorDeps = {}
    ) {
        this.metadata = deps.metadata ?? new AudioMetadataService();
        this.sleep = deps.sleep ?? abortableSleep;
    }

    /** Id of the most recently started generation. */
    public getGeneration(): number {
        return this.generation;
    }

    /** True until a newer generation starts or `cancel()` is called. */
    public isCurrent(generation: number): boolean {
        return generation === this.generation && this.controller !== null && !this.controller.signal.aborted;
    }

    /** Aborts the current generation, if any. */
    public cancel() {
        if (this.controller && !this.controller.signal.aborted) {
            this.controller.abort();
            Logger.info(`[SpeechGenerator] Cancelled generation ${this.generation}`);
        }
    }

    /**
     * @returns The result, or null when a newer generation or `cancel()` superseded this one.
     * @throws NormalizationError for malformed input, RangeError for a speed outside [0, 2].
     */
    public async generate(
        text: string,
        options: GenerateOptions = {},
        onProgress?: (progress: GenerationProgress) => void
    ): Promise<GenerationResult | null> {
        const speed = options.speed ?? this.config.defaultRate;
        const rate = speedToRate(speed);
        const voice = resolveVoice(options.voice ?? this.config.defaultVoice);

        const normalizer: TextNormalizer = options.markdown === false
            ? new PlainTextNormalizer()
            : new MarkdownNormalizer({ contextHints: this.config.contextHints });
        const normalized = normalizer.normalize(text);

        this.cancel();
        const generation = ++this.generation;
        const controller = new AbortController();
        this.controller = controller;

        const segments = this.splitter.split(normalized.spokenText, this.config.maxCharsPerSegment);
        Logger.info(
            `[SpeechGenerator] Generation ${generation}: ${normalized.spokenText.length} chars in ` +
            `${segments.length} segments, voice ${voice}, rate ${rate}`
        );

        const context: RequestContext = { generation, voice, rate, speed, signal: controller.signal };
        const outcomes = await this.synthesizeAll(segments, context, onProgress);

        if (!this.isCurrent(generation)) {
            Logger.info(`[SpeechGenerator] Dropping results of stale generation ${generation}`);
            return null;
        }

        const timeline = this.collector.collect(segments, outcomes);
        const index = this.builder.build({
            normalized,
            anchors: timeline.anchors,
            totalDurationMs: timeline.totalDurationMs,
            segmentStarts: timeline.segmentStarts,
            generation
        });

        const ordered = [...outcomes].sort((a, b) => this.outcomeId(a) - this.outcomeId(b));
        const audio = segments.map(segment => {
            const outcome = ordered.find(o => this.outcomeId(o) === segment.id);
            return outcome && outcome.ok ? outcome.timing.audio : new Uint8Array(0);
        });
        const first = ordered.find(o => o.ok);
        const mimeType = first && first.ok && first.timing.mimeType ? first.timing.mimeType : DEFAULT_MIME_TYPE;

        if (timeline.failedSegments.length > 0) {
            Logger.warn(
                `[SpeechGenerator] Generation ${generation}: ${timeline.failedSegments.length} of ` +
                `${segments.length} segments failed; their words are interpolated`
            );
        }

        return {
            generation,
            normalized,
            segments,
            outcomes: ordered,
            audio,
            mimeType,
            index,
            segmentDurations: timeline.segmentDurations,
            failedSegments: timeline.failedSegments,
            alignmentErrors: timeline.alignmentErrors,
            voice,
            rate
        };
    }

    private outcomeId(outcome: SegmentOutcome): number {
        return outcome.ok ? outcome.timing.segmentId : outcome.segmentId;
    }

    private async synthesizeAll(
        segments: Segment[],
        context: RequestContext,
        onProgress?: (progress: GenerationProgress) => void
    ): Promise<SegmentOutcome[]> {
        const concurrency = Math.max(1, Math.min(this.config.synthesisConcurrency, MAX_CONCURRENCY));
        const queue = [...segments];
        const outcomes: SegmentOutcome[] = [];
        let completed = 0;

        const worker = async () => {
            while (queue.length) {
                const segment = queue.shift();
                if (!segment || context.signal.aborted) break;

                const outcome = await this.synthesizeSegment(segment, context);
                outcomes.push(outcome);
                completed += 1;

                if (this.isCurrent(context.generation)) {
                    onProgress?.({
                        generation: context.generation,
                        completed,
                        total: segments.length,
                        segmentId: segment.id,
                        ok: outcome.ok
                    });
                }
            }
        };

        const workers = Array.from({ length: Math.min(concurrency, segments.length) }, () => worker());
        await Promise.all(workers);
        return outcomes;
    }

    private async synthesizeSegment(segment: Segment, context: RequestContext): Promise<SegmentOutcome> {
        const attempts = this.config.synthesisRetries + 1;
        let lastError: unknown;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const result = await this.backend.synthesize({
                    segmentId: segment.id,
                    text: segment.text,
                    voice: context.voice,
                    rate: context.rate,
                    signal: context.signal
                });
                return { ok: true, timing: await this.toTiming(segment, result, context) };
            } catch (error) {
                lastError = error;
                if (context.signal.aborted) break;

                const status = error instanceof SynthesisError ? error.status : undefined;
                if (attempt >= attempts || (status !== undefined && status < 500 && status !== 429)) break;

                const delay = Math.min(MAX_RETRY_DELAY_MS, this.config.retryDelayMs * 2 ** (attempt - 1));
                Logger.warn(
                    `[SpeechGenerator] Segment ${segment.id} attempt ${attempt} failed, retrying in ${delay}ms`,
                    describeError(error)
                );
                await this.sleep(delay, context.signal);
            }
        }

        const error = lastError instanceof SynthesisError && lastError.segmentId === segment.id
            ? lastError
            : new SynthesisError(describeError(lastError), segment.id, { cause: lastError });
        Logger.warn(error.message);
        return { ok: false, segmentId: segment.id, error };
    }

    private async toTiming(segment: Segment, result: SynthesisResult, context: RequestContext): Promise<SegmentTiming> {
        const hints: BoundaryHint[] = result.boundaries.map(boundary => ({
            segmentId: segment.id,
            chunkRelativeTextOffset: boundary.textOffset,
            chunkRelativeAudioTime: boundary.audioTime,
            text: boundary.text,
            duration: boundary.duration
        }));

        const mimeType = result.mimeType ?? DEFAULT_MIME_TYPE;
        const durationMs = await this.measureDuration(segment, result, hints, mimeType, context.speed);
        return { segmentId: segment.id, audio: result.audio, hints, durationMs, mimeType };
    }

    /**
     * Backend-reported length, else the audio container's, else the end of the
     * last boundary plus padding, else a words-per-minute estimate.
     */
    private async measureDuration(
        segment: Segment,
        result: SynthesisResult,
        hints: BoundaryHint[],
        mimeType: string,
        speed: number
    ): Promise<number> {
        if (result.durationMs !== undefined && Number.isFinite(result.durationMs) && result.durationMs >= 0) {
            return result.durationMs;
        }

        const measured = await this.metadata.measureDuration(result.audio, mimeType);
        if (measured !== null) return measured;

        if (hints.length > 0) {
            const lastEnd = Math.max(...hints.map(h => h.chunkRelativeAudioTime + (h.duration ?? 0)));
            return lastEnd + this.config.trailingPaddingMs;
        }

        const words = tokenizeWords(segment.text).length;
        const estimate = (words * 60000) / this.config.fallbackWordsPerMinute / (speed > 0 ? speed : 1);
        Logger.debug(`[SpeechGenerator] Segment ${segment.id}: estimated ${Math.round(estimate)}ms from ${words} words`);
        return estimate;
    }
}
