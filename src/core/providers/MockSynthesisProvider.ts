import { SynthesisError } from "../errors/SpeechErrors";
import type { SynthesisBackend, SynthesisBoundary, SynthesisRequest, SynthesisResult, VoiceInfo, VoiceLanguage } from "../interfaces/SynthesisBackend";
import { tokenizeWords } from "../utils/TextPatterns";
import { filterVoices } from "../utils/VoiceOptions";

const MOCK_VOICES: VoiceInfo[] = [
    { name: "en-US-JennyNeural", gender: "Female", language: "en-US" },
    { name: "en-GB-RyanNeural", gender: "Male", language: "en-GB" },
    { name: "fr-FR-DeniseNeural", gender: "Female", language: "fr-FR" }
];

export interface MockSynthesisOptions {
    /** Spoken length of every word. Default 300 ms. */
    msPerWord?: number;

    /** Simulated latency, fixed or per request. */
    delayMs?: number | ((request: SynthesisRequest) => number);

    /** Segments that always fail. */
    failSegments?: number[];

    /** Failures before a segment succeeds, per segment id. */
    transientFailures?: Record<number, number>;

    /** Status carried by scripted failures. Default 500. */
    failStatus?: number;

    /** Words (by position in the segment) whose boundary is not reported. */
    dropWord?: (wordIndex: number, segmentId: number) => boolean;

    /** Report boundaries last-to-first. */
    reverseBoundaries?: boolean;

    /** Leave `durationMs` out of the result. */
    omitDuration?: boolean;

    /** Voices offered by `listVoices`. */
    voices?: VoiceInfo[];
}

/**
 * Deterministic in-process backend. Every word lasts `msPerWord`; the audio
 * is one byte per word so concatenation can be checked by content.
 */
export class MockSynthesisProvider implements SynthesisBackend {
    public name = "MockSynthesis";

    /** Every request received, in arrival order. */
    public readonly requests: SynthesisRequest[] = [];

    private readonly failuresLeft = new Map<number, number>();

    constructor(private readonly options: MockSynthesisOptions = {}) {
        for (const [id, count] of Object.entries(options.transientFailures ?? {})) {
            this.failuresLeft.set(Number(id), count);
        }
    }

    public async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
        this.requests.push(request);

        const delay = typeof this.options.delayMs === "function"
            ? this.options.delayMs(request)
            : this.options.delayMs ?? 0;
        await new Promise(resolve => setTimeout(resolve, delay));

        if (request.signal?.aborted) {
            throw new SynthesisError("aborted", request.segmentId);
        }

        const status = this.options.failStatus ?? 500;
        if (this.options.failSegments?.includes(request.segmentId)) {
            throw new SynthesisError("scripted failure", request.segmentId, { status });
        }
        const left = this.failuresLeft.get(request.segmentId) ?? 0;
        if (left > 0) {
            this.failuresLeft.set(request.segmentId, left - 1);
            throw new SynthesisError("transient failure", request.segmentId, { status });
        }

        const msPerWord = this.options.msPerWord ?? 300;
        const words = tokenizeWords(request.text);
        const boundaries: SynthesisBoundary[] = [];

        words.forEach((word, i) => {
            if (this.options.dropWord?.(i, request.segmentId)) return;
            boundaries.push({ textOffset: word.start, audioTime: i * msPerWord, duration: msPerWord, text: word.text });
        });
        if (this.options.reverseBoundaries) boundaries.reverse();

        return {
            audio: Uint8Array.from(words, (_, i) => (request.segmentId * 16 + i) % 256),
            boundaries,
            durationMs: this.options.omitDuration ? undefined : words.length * msPerWord,
            mimeType: "audio/mpeg"
        };
    }

    public async listVoices(language?: VoiceLanguage): Promise<VoiceInfo[]> {
        return filterVoices(this.options.voices ?? MOCK_VOICES, language);
    }
}
