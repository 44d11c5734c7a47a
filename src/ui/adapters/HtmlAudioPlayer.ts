import type { AudioPlayer } from '../../core/interfaces/AudioPlayer';
import { Logger } from '../../core/utils/Logger';

/**
 * The parts of `HTMLMediaElement` the player uses. Times are seconds.
 */
export interface MediaElementLike {
    src: string;
    currentTime: number;
    duration: number;
    playbackRate: number;
    play(): Promise<void>;
    pause(): void;
    load(): void;
    addEventListener(type: string, listener: () => void): void;
    removeEventListener(type: string, listener: () => void): void;
}

export interface ObjectUrlFactory {
    create(blob: Blob): string;
    revoke(url: string): void;
}

const browserUrls: ObjectUrlFactory = {
    create: blob => URL.createObjectURL(blob),
    revoke: url => URL.revokeObjectURL(url)
};

// Events after which the element's clock has moved
const POSITION_EVENTS = ['timeupdate', 'seeked'];

/**
 * Plays generated audio through an `<audio>` element.
 */
export class HtmlAudioPlayer implements AudioPlayer {
    private listeners: ((timeMs: number) => void)[] = [];
    private objectUrl: string | null = null;
    private readonly onTimeUpdate = () => {
        const timeMs = this.element.currentTime * 1000;
        this.listeners.forEach(l => l(timeMs));
    };

    constructor(
        private readonly element: MediaElementLike,
        private readonly urls: ObjectUrlFactory = browserUrls
    ) {
        POSITION_EVENTS.forEach(type => this.element.addEventListener(type, this.onTimeUpdate));
    }

    public async load(audio: Uint8Array, mimeType = 'audio/mpeg'): Promise<void> {
        this.releaseUrl();
        this.objectUrl = this.urls.create(new Blob([new Uint8Array(audio)], { type: mimeType }));
        this.element.src = this.objectUrl;
        this.element.load();
        Logger.debug(`[HtmlAudioPlayer] Loaded ${audio.length} bytes of ${mimeType}`);
    }

    public async play(): Promise<void> {
        await this.element.play();
    }

    public pause() {
        this.element.pause();
    }

    public seek(timeMs: number) {
        this.element.currentTime = Math.max(0, timeMs) / 1000;
    }

    public setRate(multiplier: number) {
        this.element.playbackRate = multiplier;
    }

    public onPositionChanged(listener: (timeMs: number) => void): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public getDuration(): number | null {
        const seconds = this.element.duration;
        return Number.isFinite(seconds) ? seconds * 1000 : null;
    }

    /** Detaches from the element and frees the audio URL. */
    public dispose() {
        POSITION_EVENTS.forEach(type => this.element.removeEventListener(type, this.onTimeUpdate));
        this.listeners = [];
        this.element.pause();
        this.releaseUrl();
    }

    private releaseUrl() {
        if (this.objectUrl) {
            this.urls.revoke(this.objectUrl);
            this.objectUrl = null;
        }
    }
}
