import JSZip from 'jszip';
import { Logger } from '../utils/Logger';
import { CaptionService } from './CaptionService';
import type { GenerationResult } from './SpeechGenerator';

export interface ConcatenatedAudio {
    bytes: Uint8Array;

    /** Byte offset of each chunk in `bytes`. */
    offsets: number[];
}

export interface TimingsDocument {
    generation: number;
    voice: string;
    rate: string;
    totalDurationMs: number;
    segments: {
        id: number;
        text: string;
        audioStart: number;
        durationMs: number;
        byteOffset: number;
        byteLength: number;
        failed: boolean;
    }[];
    words: {
        index: number;
        text: string;
        start: number;
        end: number;
        originalStart: number;
        originalEnd: number;
        interpolated: boolean;
    }[];
}

const EXTENSIONS: Record<string, string> = {
    "audio/mpeg": "mp3",
    "audio/mp3": "mp3",
    "audio/wav": "wav",
    "audio/x-wav": "wav",
    "audio/ogg": "ogg",
    "audio/webm": "webm"
};

/**
 * Packs a generation for download: the joined audio, word timings, captions
 * and the spoken text.
 */
export class AudioExporter {
    private captions = new CaptionService();

    /**
     * Byte-exact concatenation in the given order. MP3 frames are
     * self-delimiting, so joined segments play back to back.
     */
    public concatenate(chunks: readonly Uint8Array[]): ConcatenatedAudio {
        const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
        const bytes = new Uint8Array(total);
        const offsets: number[] = [];

        let cursor = 0;
        for (const chunk of chunks) {
            offsets.push(cursor);
            bytes.set(chunk, cursor);
            cursor += chunk.length;
        }

        return { bytes, offsets };
    }

    public buildTimings(result: GenerationResult): TimingsDocument {
        const { offsets } = this.concatenate(result.audio);
        const failed = new Set(result.failedSegments);

        return {
            generation: result.generation,
            voice: result.voice,
            rate: result.rate,
            totalDurationMs: result.index.totalDurationMs,
            segments: result.segments.map((segment, i) => ({
                id: segment.id,
                text: segment.text,
                audioStart: result.index.segmentStarts[i] ?? 0,
                durationMs: result.segmentDurations[i] ?? 0,
                byteOffset: offsets[i] ?? 0,
                byteLength: result.audio[i]?.length ?? 0,
                failed: failed.has(segment.id)
            })),
            words: result.index.words.map(word => ({
                index: word.wordIndex,
                text: word.text,
                start: word.audioStart,
                end: word.audioEnd,
                originalStart: word.originalRange.start,
                originalEnd: word.originalRange.end,
                interpolated: word.interpolated
            }))
        };
    }

    public audioFileName(mimeType: string): string {
        return `speech.${EXTENSIONS[mimeType.toLowerCase()] ?? "bin"}`;
    }

    /**
     * Zip archive with the audio, `timings.json`, `captions.srt`,
     * `captions.vtt` and `speech.txt`.
     */
    public async exportBundle(result: GenerationResult): Promise<Uint8Array> {
        const zip = new JSZip();
        const { bytes } = this.concatenate(result.audio);
        const cues = this.captions.buildCues(result.index);

        zip.file(this.audioFileName(result.mimeType), bytes);
        zip.file("timings.json", JSON.stringify(this.buildTimings(result), null, 2));
        zip.file("captions.srt", this.captions.toSrt(cues));
        zip.file("captions.vtt", this.captions.toVtt(cues));
        zip.file("speech.txt", result.normalized.spokenText);

        const archive = await zip.generateAsync({ type: "uint8array" });
        Logger.info(`[Export] Bundled generation ${result.generation}: ${bytes.length} audio bytes, ${cues.length} cues`);
        return archive;
    }
}
