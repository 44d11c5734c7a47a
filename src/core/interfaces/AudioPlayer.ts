/**
 * Interface for whatever plays the generated audio.
 * All times are milliseconds.
 */
export interface AudioPlayer {
    load(audio: Uint8Array, mimeType?: string): Promise<void>;

    play(): Promise<void>;

    pause(): void;

    seek(timeMs: number): void;

    setRate(multiplier: number): void;

    /**
     * Subscribe to position updates. Updates may arrive late or slightly out of order.
     * @returns Unsubscribe function.
     */
    onPositionChanged(listener: (timeMs: number) => void): () => void;

    /** Null until the audio is loaded and its length known. */
    getDuration(): number | null;
}
