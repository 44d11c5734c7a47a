export type SpeechErrorCode =
    | "NORMALIZATION"
    | "SYNTHESIS"
    | "ALIGNMENT"
    | "NOT_READY"
    | "CONFIG";

/**
 * Base class for every error raised by the read-aloud core.
 * `code` lets callers branch without `instanceof` across bundles.
 */
export class SpeechError extends Error {
    constructor(public readonly code: SpeechErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SpeechError";
    }
}

/**
 * Input text could not be decoded (lone surrogates, invalid UTF-8).
 * Fatal for the generation that received it.
 */
export class NormalizationError extends SpeechError {
    constructor(message: string, public readonly offset: number) {
        super("NORMALIZATION", `[Normalize] ${message} at offset ${offset}`);
        this.name = "NormalizationError";
    }
}

/**
 * The synthesis backend failed for one segment.
 * Recoverable: the segment's words are timed by interpolation.
 */
export class SynthesisError extends SpeechError {
    /** HTTP status reported by a remote backend, when there was one. */
    public readonly status: number | undefined;

    constructor(
        message: string,
        public readonly segmentId: number,
        options?: { cause?: unknown; status?: number }
    ) {
        super("SYNTHESIS", `[Synthesis] segment ${segmentId}: ${message}`, options);
        this.name = "SynthesisError";
        this.status = options?.status;
    }
}

/**
 * Segment timing contradicted the monotonic timeline and was clamped.
 */
export class AlignmentError extends SpeechError {
    constructor(message: string, public readonly segmentId: number) {
        super("ALIGNMENT", `[Alignment] segment ${segmentId}: ${message}`);
        this.name = "AlignmentError";
    }
}

export class NotReadyError extends SpeechError {
    constructor(action: string) {
        super("NOT_READY", `Cannot ${action}: no word index is loaded for the current audio.`);
        this.name = "NotReadyError";
    }
}

export class ConfigError extends SpeechError {
    constructor(message: string) {
        super("CONFIG", `[Config] ${message}`);
        this.name = "ConfigError";
    }
}
