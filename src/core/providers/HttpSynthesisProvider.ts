import { z } from "zod";
import { SpeechError, SynthesisError } from "../errors/SpeechErrors";
import type { SynthesisBackend, SynthesisRequest, SynthesisResult, VoiceInfo, VoiceLanguage } from "../interfaces/SynthesisBackend";
import { Logger } from "../utils/Logger";
import { filterVoices } from "../utils/VoiceOptions";

// Boundary offsets and durations arrive in 100-nanosecond ticks
const TICKS_PER_MS = 10_000;

const boundarySchema = z.object({
    offset: z.number().nonnegative(),
    duration: z.number().nonnegative().optional(),
    text: z.string().optional(),
    textOffset: z.number().int().nonnegative()
});

const responseSchema = z.object({
    audio: z.string(),
    durationMs: z.number().nonnegative().optional(),
    mimeType: z.string().optional(),
    boundaries: z.array(boundarySchema).default([])
});

const voicesSchema = z.array(z.object({
    name: z.string(),
    gender: z.string().default("Unknown"),
    locale: z.string()
}));

export interface HttpSynthesisOptions {
    /** URL accepting `POST {text, voice, rate}`. */
    endpoint: string;

    /** URL answering `GET` with the voice list. Defaults to `voices` beside `endpoint`. */
    voicesEndpoint?: string;

    headers?: Record<string, string>;
}

function decodeBase64(data: string): Uint8Array {
    return Uint8Array.from(atob(data), c => c.charCodeAt(0));
}

/**
 * Talks to a speech service over JSON/HTTP. The service answers with base64
 * audio and a list of word boundaries.
 */
export class HttpSynthesisProvider implements SynthesisBackend {
    public name = "HTTP";

    constructor(private readonly options: HttpSynthesisOptions) {}

    public async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
        const { segmentId } = request;
        Logger.debug(`[HTTP] POST ${this.options.endpoint} for segment ${segmentId} (${request.text.length} chars)`);

        let response: Response;
        try {
            response = await fetch(this.options.endpoint, {
                method: "POST",
                headers: { "Content-Type": "application/json", ...this.options.headers },
                body: JSON.stringify({ text: request.text, voice: request.voice, rate: request.rate }),
                signal: request.signal
            });
        } catch (error) {
            throw new SynthesisError(`request failed: ${error instanceof Error ? error.message : String(error)}`, segmentId, { cause: error });
        }

        if (!response.ok) {
            throw new SynthesisError(`backend returned status ${response.status}`, segmentId, { status: response.status });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new SynthesisError("response is not JSON", segmentId, { cause: error });
        }

        const parsed = responseSchema.safeParse(body);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
            throw new SynthesisError(`malformed response (${issues})`, segmentId, { cause: parsed.error });
        }

        let audio: Uint8Array;
        try {
            audio = decodeBase64(parsed.data.audio);
        } catch (error) {
            throw new SynthesisError("audio is not valid base64", segmentId, { cause: error });
        }

        return {
            audio,
            durationMs: parsed.data.durationMs,
            mimeType: parsed.data.mimeType,
            boundaries: parsed.data.boundaries.map(boundary => ({
                textOffset: boundary.textOffset,
                audioTime: boundary.offset / TICKS_PER_MS,
                duration: boundary.duration === undefined ? undefined : boundary.duration / TICKS_PER_MS,
                text: boundary.text
            }))
        };
    }

    public async listVoices(language?: VoiceLanguage): Promise<VoiceInfo[]> {
        const url = this.options.voicesEndpoint ?? new URL("voices", this.options.endpoint).toString();
        Logger.debug(`[HTTP] GET ${url}`);

        let response: Response;
        try {
            response = await fetch(url, { headers: this.options.headers });
        } catch (error) {
            throw new SpeechError("SYNTHESIS", `[Voices] request failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }
        if (!response.ok) {
            throw new SpeechError("SYNTHESIS", `[Voices] backend returned status ${response.status}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new SpeechError("SYNTHESIS", "[Voices] response is not JSON", { cause: error });
        }

        const parsed = voicesSchema.safeParse(body);
        if (!parsed.success) {
            throw new SpeechError("SYNTHESIS", `[Voices] malformed voice list (${parsed.error.issues.length} issues)`, { cause: parsed.error });
        }

        const voices = parsed.data.map(voice => ({ name: voice.name, gender: voice.gender, language: voice.locale }));
        return filterVoices(voices, language);
    }
}
