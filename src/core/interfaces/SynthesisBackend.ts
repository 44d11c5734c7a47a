/**
 * One synthesis request. Each segment is requested independently.
 */
export interface SynthesisRequest {
    /** Segment the request belongs to, for error reporting. */
    segmentId: number;

    text: string;

    /** Backend voice name, already resolved from any alias. */
    voice: string;

    /** Signed percentage such as "+25%". */
    rate: string;

    signal?: AbortSignal;
}

/**
 * Word boundary reported by a backend, relative to the request.
 */
export interface SynthesisBoundary {
    /** Character offset into the request text. */
    textOffset: number;

    /** Milliseconds from the start of the returned audio. */
    audioTime: number;

    text?: string;
    duration?: number;
}

export interface SynthesisResult {
    audio: Uint8Array;

    /** Unordered, possibly incomplete. */
    boundaries: SynthesisBoundary[];

    durationMs?: number;

    /** Defaults to audio/mpeg. */
    mimeType?: string;
}

export interface VoiceInfo {
    /** Full voice id, e.g. "en-US-JennyNeural". */
    name: string;
    gender: string;

    /** Locale such as "en-US". */
    language: string;
}

/**
 * Locale prefixes to keep ("en", "fr-CA"), or "all".
 * Omitted means the default language only.
 */
export type VoiceLanguage = string | string[];

/**
 * Interface for a neural-voice text-to-speech service.
 */
export interface SynthesisBackend {
    /**
     * Name of the backend.
     */
    name: string;

    /**
     * Synthesize one segment.
     * @throws SynthesisError (or any error) on failure; the caller decides whether to retry.
     */
    synthesize(request: SynthesisRequest): Promise<SynthesisResult>;

    /**
     * Voices the backend offers, filtered by locale prefix.
     */
    listVoices?(language?: VoiceLanguage): Promise<VoiceInfo[]>;
}
