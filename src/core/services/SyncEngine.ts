import { NotReadyError } from "../errors/SpeechErrors";
import type { TextRange } from "../models/SpeechData";
import type { PlaybackState, WordIndex } from "../models/WordTimeline";
import { Logger } from "../utils/Logger";
import { PlaybackSynchronizer } from "./PlaybackSynchronizer";

export type SyncState = "idle" | "playing" | "paused" | "seeking";

/**
 * Emitted whenever the highlighted word changes.
 * `wordIndex` is -1 (and the ranges null) when the highlight is cleared.
 */
export interface HighlightChange {
    generation: number;
    wordIndex: number;
    previousWordIndex: number;
    originalRange: TextRange | null;
    normalizedRange: TextRange | null;
    audioTime: number;
}

export type HighlightListener = (change: HighlightChange) => void;

export interface SyncSnapshot {
    state: SyncState;
    generation: number;
    wordIndex: number;
    audioTime: number;

    /** 0..1 within the current word. */
    progress: number;

    rate: number;
}

export interface SyncEngineOptions {
    /**
     * A report this far behind the last accepted position is treated as jitter
     * and dropped once. Default 250 ms.
     */
    jitterToleranceMs?: number;
}

/**
 * Playback synchronization state machine.
 *
 * Receives position reports from the audio player and turns them into
 * highlight changes. Reports are tagged with the generation they belong to;
 * anything from an older generation is ignored.
 */
export class SyncEngine {
    private readonly synchronizer = new PlaybackSynchronizer();
    private readonly jitterToleranceMs: number;

    private index: WordIndex | null = null;
    private generation = -1;
    private state: SyncState = "idle";
    private playback: PlaybackState | null = null;
    private rate = 1;
    private backwardPending = false;

    private listeners: HighlightListener[] = [];
    private stateListeners: (() => void)[] = [];
    private snapshot: SyncSnapshot;

    constructor(options: SyncEngineOptions = {}) {
        this.jitterToleranceMs = Math.max(0, options.jitterToleranceMs ?? 250);
        this.snapshot = this.createSnapshot();
    }

    /**
     * Installs the word index of a new generation. Any playback state of the
     * previous generation is dropped and the engine returns to idle.
     */
    public load(index: WordIndex, generation: number = index.generation) {
        this.clearHighlight(0);
        this.index = index;
        this.generation = generation;
        this.playback = null;
        this.backwardPending = false;
        this.state = "idle";
        Logger.info(`[SyncEngine] Loaded generation ${generation} (${index.words.length} words)`);
        this.publish();
    }

    public unload() {
        this.clearHighlight(0);
        this.index = null;
        this.playback = null;
        this.backwardPending = false;
        this.state = "idle";
        this.publish();
    }

    public play() {
        if (!this.index) throw new NotReadyError("play");
        if (this.state === "playing") return;

        if (!this.playback) {
            this.playback = {
                currentAudioTime: 0,
                lastReportedWordIndex: -1,
                isPlaying: true,
                rate: this.rate
            };
        }
        this.playback.isPlaying = true;
        this.transition("playing");
    }

    public pause() {
        if (this.state !== "playing" || !this.playback) return;
        this.playback.isPlaying = false;
        this.transition("paused");
    }

    public stop() {
        if (this.state === "idle" && !this.playback) return;
        this.clearHighlight(0);
        this.playback = null;
        this.backwardPending = false;
        this.transition("idle");
    }

    /**
     * Jumps to `timeMs`, bypassing the jitter filter. From idle the engine
     * ends up paused at the new position.
     */
    public seek(timeMs: number) {
        if (!this.index) throw new NotReadyError("seek");
        if (!Number.isFinite(timeMs)) throw new RangeError(`Cannot seek to ${timeMs}`);

        const resumeTo: SyncState = this.state === "playing" ? "playing" : "paused";
        if (!this.playback) {
            this.playback = { currentAudioTime: 0, lastReportedWordIndex: -1, isPlaying: false, rate: this.rate };
        }

        this.state = "seeking";
        this.backwardPending = false;
        this.apply(Math.max(0, timeMs));
        this.playback.isPlaying = resumeTo === "playing";
        this.transition(resumeTo);
    }

    /**
     * Seeks to the start of a word.
     * @returns The audio time that was sought to.
     */
    public seekToWord(wordIndex: number): number {
        const time = this.timeForWord(wordIndex);
        this.seek(time);
        return time;
    }

    /**
     * Feeds a position from the audio player.
     * @param generation Generation the player was loaded with; stale reports are dropped.
     * @returns Whether the report was accepted.
     */
    public reportPosition(timeMs: number, generation?: number): boolean {
        if (!this.index || !this.playback) return false;
        if (this.state === "idle" || this.state === "seeking") return false;
        if (generation !== undefined && generation !== this.generation) {
            Logger.debug(`[SyncEngine] Dropped report from generation ${generation} (current ${this.generation})`);
            return false;
        }
        if (!Number.isFinite(timeMs)) return false;

        if (timeMs < this.playback.currentAudioTime - this.jitterToleranceMs) {
            if (!this.backwardPending) {
                // One backward report is jitter; two in a row are a real jump.
                this.backwardPending = true;
                Logger.debug(`[SyncEngine] Holding back backward report at ${timeMs}ms`);
                return false;
            }
        }

        this.backwardPending = false;
        this.apply(timeMs);
        return true;
    }

    public setRate(multiplier: number) {
        if (!Number.isFinite(multiplier) || multiplier <= 0) {
            throw new RangeError(`Playback rate must be positive, got ${multiplier}`);
        }
        this.rate = multiplier;
        if (this.playback) this.playback.rate = multiplier;
        this.publish();
    }

    /**
     * @throws NotReadyError without an index, RangeError for an unknown word.
     */
    public timeForWord(wordIndex: number): number {
        if (!this.index) throw new NotReadyError("look up a word");
        return this.synchronizer.timeForWord(this.index, wordIndex);
    }

    public subscribe(listener: HighlightListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /** Notified whenever `getSnapshot()` changes. */
    public subscribeState(listener: () => void): () => void {
        this.stateListeners.push(listener);
        return () => {
            this.stateListeners = this.stateListeners.filter(l => l !== listener);
        };
    }

    /** Stable between changes, suitable for `useSyncExternalStore`. */
    public getSnapshot(): SyncSnapshot {
        return this.snapshot;
    }

    public getState(): SyncState {
        return this.state;
    }

    public getGeneration(): number {
        return this.generation;
    }

    public getIndex(): WordIndex | null {
        return this.index;
    }

    public getCurrentWordIndex(): number {
        return this.playback ? this.playback.lastReportedWordIndex : -1;
    }

    public getPlaybackState(): PlaybackState | null {
        return this.playback ? { ...this.playback } : null;
    }

    private apply(timeMs: number) {
        if (!this.index || !this.playback) return;

        this.playback.currentAudioTime = timeMs;
        const next = this.synchronizer.findWordIndex(this.index, timeMs);
        const previous = this.playback.lastReportedWordIndex;
        this.playback.lastReportedWordIndex = next;

        if (next !== previous) {
            const word = next >= 0 ? this.index.words[next] : undefined;
            this.emit({
                generation: this.generation,
                wordIndex: next,
                previousWordIndex: previous,
                originalRange: word ? word.originalRange : null,
                normalizedRange: word ? word.normalizedRange : null,
                audioTime: timeMs
            });
        }
        this.publish();
    }

    private clearHighlight(audioTime: number) {
        const previous = this.playback ? this.playback.lastReportedWordIndex : -1;
        if (previous === -1) return;
        if (this.playback) this.playback.lastReportedWordIndex = -1;
        this.emit({
            generation: this.generation,
            wordIndex: -1,
            previousWordIndex: previous,
            originalRange: null,
            normalizedRange: null,
            audioTime
        });
    }

    private transition(next: SyncState) {
        if (this.state !== next) {
            Logger.debug(`[SyncEngine] ${this.state} -> ${next}`);
        }
        this.state = next;
        this.publish();
    }

    private emit(change: HighlightChange) {
        this.listeners.forEach(l => l(change));
    }

    private publish() {
        this.snapshot = this.createSnapshot();
        this.stateListeners.forEach(l => l());
    }

    private createSnapshot(): SyncSnapshot {
        const wordIndex = this.getCurrentWordIndex();
        const audioTime = this.playback ? this.playback.currentAudioTime : 0;
        const word = this.index && wordIndex >= 0 ? this.index.words[wordIndex] : undefined;

        return {
            state: this.state,
            generation: this.generation,
            wordIndex,
            audioTime,
            progress: word ? this.synchronizer.calculateWordProgress(word, audioTime) : 0,
            rate: this.rate
        };
    }
}
