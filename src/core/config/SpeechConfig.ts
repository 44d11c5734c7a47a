import { z } from "zod";
import { ConfigError } from "../errors/SpeechErrors";
import type { LogLevel } from "../utils/Logger";

/**
 * Tunables of the read-aloud pipeline.
 */
export interface SpeechConfig {
    /** Backend limit on characters per synthesis request. */
    maxCharsPerSegment: number;

    /** Parallel synthesis requests (1-8). */
    synthesisConcurrency: number;

    /** Extra attempts per segment after the first failure. */
    synthesisRetries: number;

    /** Base delay of the exponential retry backoff. */
    retryDelayMs: number;

    /**
     * How far a position report may go backwards before it is treated as
     * out-of-order jitter rather than playback.
     */
    jitterToleranceMs: number;

    /** Speak "Title —", "code snippet:" and similar cues for markup. */
    contextHints: boolean;

    defaultVoice: string;

    defaultRate: number;

    /** Used to estimate a segment's length when nothing better is known. */
    fallbackWordsPerMinute: number;

    /** Added after the last boundary when estimating a segment's length. */
    trailingPaddingMs: number;

    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<SpeechConfig> = Object.freeze({
    maxCharsPerSegment: 2000,
    synthesisConcurrency: 3,
    synthesisRetries: 2,
    retryDelayMs: 500,
    jitterToleranceMs: 250,
    contextHints: true,
    defaultVoice: "alloy",
    defaultRate: 1.0,
    fallbackWordsPerMinute: 150,
    trailingPaddingMs: 500,
    logLevel: "info"
});

const booleanFromEnv = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes");

const configSchema = z.object({
    maxCharsPerSegment: z.coerce.number().int().min(1),
    synthesisConcurrency: z.coerce.number().int().min(1).transform((n) => Math.min(n, 8)),
    synthesisRetries: z.coerce.number().int().min(0).max(10),
    retryDelayMs: z.coerce.number().min(0),
    jitterToleranceMs: z.coerce.number().min(0),
    contextHints: z.preprocess(
        (v) => (typeof v === "string" ? v.toLowerCase() : v),
        z.union([z.boolean(), booleanFromEnv])
    ),
    defaultVoice: z.string().min(1),
    defaultRate: z.coerce.number().min(0).max(2),
    fallbackWordsPerMinute: z.coerce.number().min(1),
    trailingPaddingMs: z.coerce.number().min(0),
    logLevel: z.enum(["debug", "info", "warn", "error"])
});

const ENV_KEYS: Record<keyof SpeechConfig, string> = {
    maxCharsPerSegment: "SPEECH_MAX_CHARS",
    synthesisConcurrency: "SPEECH_CONCURRENCY",
    synthesisRetries: "SPEECH_RETRIES",
    retryDelayMs: "SPEECH_RETRY_DELAY_MS",
    jitterToleranceMs: "SPEECH_JITTER_TOLERANCE_MS",
    contextHints: "SPEECH_CONTEXT_HINTS",
    defaultVoice: "SPEECH_DEFAULT_VOICE",
    defaultRate: "SPEECH_DEFAULT_RATE",
    fallbackWordsPerMinute: "SPEECH_WORDS_PER_MINUTE",
    trailingPaddingMs: "SPEECH_TRAILING_PADDING_MS",
    logLevel: "SPEECH_LOG_LEVEL"
};

/**
 * Builds the effective configuration: defaults, then environment, then overrides.
 * @param env Environment variables to read (defaults to `process.env`, or none in a browser).
 * @param overrides Values that win over everything else.
 */
export function loadConfig(
    env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
    overrides: Partial<SpeechConfig> = {}
): SpeechConfig {
    const raw: Record<string, unknown> = { ...DEFAULT_CONFIG };

    for (const [key, envName] of Object.entries(ENV_KEYS)) {
        const value = env[envName];
        if (value !== undefined && value.trim() !== "") {
            raw[key] = value.trim();
        }
    }

    Object.assign(raw, overrides);

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid configuration (${issues})`);
    }

    return parsed.data;
}
