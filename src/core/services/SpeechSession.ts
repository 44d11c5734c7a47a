import { DEFAULT_CONFIG, type SpeechConfig } from "../config/SpeechConfig";
import type { AudioPlayer } from "../interfaces/AudioPlayer";
import type { HighlightSink } from "../interfaces/HighlightSink";
import type { SynthesisBackend, VoiceInfo, VoiceLanguage } from "../interfaces/SynthesisBackend";
import { Logger } from "../utils/Logger";
import { decodeDocument } from "../utils/TextEncoding";
import { AudioExporter } from "./AudioExporter";
import { SpeechGenerator, type GenerateOptions, type GenerationProgress, type GenerationResult } from "./SpeechGenerator";
import { SyncEngine, type HighlightListener } from "./SyncEngine";

export interface SpeechSessionOptions {
    backend: SynthesisBackend;
    player: AudioPlayer;
    config?: SpeechConfig;

    /** Replaces the generator built from `backend` and `config`. */
    generator?: SpeechGenerator;
}

/**
 * Facade over the whole read-aloud flow: generation, audio playback and
 * highlight sync.
 *
 * The player's position stream is bound per generation, so late updates
 * from audio that has been replaced never reach the engine.
 */
export class SpeechSession {
    private readonly generator: SpeechGenerator;
    private readonly engine: SyncEngine;
    private readonly player: AudioPlayer;
    private readonly backend: SynthesisBackend;
    private readonly exporter = new AudioExporter();

    private current: GenerationResult | null = null;
    private unbindPlayer: (() => void) | null = null;

    constructor(options: SpeechSessionOptions) {
        const config = options.config ?? DEFAULT_CONFIG;
        Logger.setLevel(config.logLevel);

        this.generator = options.generator ?? new SpeechGenerator(options.backend, config);
        this.engine = new SyncEngine({ jitterToleranceMs: config.jitterToleranceMs });
        this.player = options.player;
        this.backend = options.backend;
    }

    /**
     * Synthesizes `text` and makes it the session's audio.
     * @returns The generation, or null when a newer call superseded it.
     */
    public async generate(
        text: string,
        options: GenerateOptions = {},
        onProgress?: (progress: GenerationProgress) => void
    ): Promise<GenerationResult | null> {
        // The previous index and its position stream go before synthesis starts
        this.unbindPlayer?.();
        this.unbindPlayer = null;
        this.player.pause();
        this.engine.unload();
        this.current = null;

        const result = await this.generator.generate(text, options, onProgress);
        if (!result) return null;

        const { bytes } = this.exporter.concatenate(result.audio);
        await this.player.load(bytes, result.mimeType);

        if (!this.generator.isCurrent(result.generation)) {
            Logger.info(`[SpeechSession] Generation ${result.generation} was superseded while loading`);
            return null;
        }

        this.engine.load(result.index, result.generation);
        this.bindPlayer(result.generation);
        this.current = result;

        if (result.failedSegments.length === result.segments.length && result.segments.length > 0) {
            Logger.error(`[SpeechSession] Every segment failed to synthesize; highlighting is estimated only`);
        }
        return result;
    }

    /**
     * Same as `generate`, for a document read as raw bytes.
     * @throws NormalizationError when the bytes are not valid UTF-8.
     */
    public async generateFromDocument(
        bytes: Uint8Array,
        options: GenerateOptions = {},
        onProgress?: (progress: GenerationProgress) => void
    ): Promise<GenerationResult | null> {
        return this.generate(decodeDocument(bytes), options, onProgress);
    }

    /**
     * @throws NotReadyError before a generation is loaded. A player that
     * refuses to start leaves the engine where it was, and its error is rethrown.
     */
    public async play(): Promise<void> {
        const wasIdle = this.engine.getState() === "idle";
        this.engine.play();
        try {
            await this.player.play();
        } catch (error) {
            Logger.warn(`[SpeechSession] Player refused to start: ${error instanceof Error ? error.message : String(error)}`);
            if (wasIdle) {
                this.engine.stop();
            } else {
                this.engine.pause();
            }
            throw error;
        }
    }

    public pause() {
        this.player.pause();
        this.engine.pause();
    }

    public stop() {
        this.player.pause();
        this.player.seek(0);
        this.engine.stop();
    }

    public seek(timeMs: number) {
        this.engine.seek(timeMs);
        this.player.seek(timeMs);
    }

    /** @returns The audio time of the word. */
    public seekToWord(wordIndex: number): number {
        const time = this.engine.seekToWord(wordIndex);
        this.player.seek(time);
        return time;
    }

    public setRate(multiplier: number) {
        this.engine.setRate(multiplier);
        this.player.setRate(multiplier);
    }

    public subscribe(listener: HighlightListener): () => void {
        return this.engine.subscribe(listener);
    }

    public attachSink(sink: HighlightSink): () => void {
        return this.engine.subscribe(change => sink.onHighlight(change));
    }

    /** Voices of the backend, or none when it cannot list them. */
    public async listVoices(language?: VoiceLanguage): Promise<VoiceInfo[]> {
        if (!this.backend.listVoices) {
            Logger.debug(`[SpeechSession] ${this.backend.name} does not list voices`);
            return [];
        }
        return this.backend.listVoices(language);
    }

    public getEngine(): SyncEngine {
        return this.engine;
    }

    public getCurrent(): GenerationResult | null {
        return this.current;
    }

    /**
     * Zip of the current generation's audio, timings and captions, or null before any generation.
     */
    public async exportCurrent(): Promise<Uint8Array | null> {
        return this.current ? this.exporter.exportBundle(this.current) : null;
    }

    public dispose() {
        this.generator.cancel();
        this.unbindPlayer?.();
        this.unbindPlayer = null;
        this.player.pause();
        this.engine.unload();
        this.current = null;
    }

    private bindPlayer(generation: number) {
        this.unbindPlayer?.();
        this.unbindPlayer = this.player.onPositionChanged(timeMs => {
            this.engine.reportPosition(timeMs, generation);
        });
    }
}
