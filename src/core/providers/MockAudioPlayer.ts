import type { AudioPlayer } from "../interfaces/AudioPlayer";

/**
 * Player without a device. Positions are pushed by calling `emitPosition`.
 */
export class MockAudioPlayer implements AudioPlayer {
    public audio: Uint8Array | null = null;
    public mimeType: string | undefined;
    public playing = false;
    public position = 0;
    public rate = 1;

    private listeners: ((timeMs: number) => void)[] = [];

    constructor(private readonly durationMs: number | null = null) {}

    public async load(audio: Uint8Array, mimeType?: string): Promise<void> {
        this.audio = audio;
        this.mimeType = mimeType;
        this.playing = false;
        this.position = 0;
    }

    public async play(): Promise<void> {
        this.playing = true;
    }

    public pause() {
        this.playing = false;
    }

    public seek(timeMs: number) {
        this.position = timeMs;
    }

    public setRate(multiplier: number) {
        this.rate = multiplier;
    }

    public onPositionChanged(listener: (timeMs: number) => void): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public getDuration(): number | null {
        return this.audio ? this.durationMs : null;
    }

    public emitPosition(timeMs: number) {
        this.position = timeMs;
        this.listeners.forEach(l => l(timeMs));
    }

    public listenerCount(): number {
        return this.listeners.length;
    }
}
