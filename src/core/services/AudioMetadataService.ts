import { parseBuffer } from 'music-metadata';
import { Logger } from '../utils/Logger';

export class AudioMetadataService {

    /**
     * Measures the playing time of an encoded audio chunk.
     * Returns null when the container does not reveal it.
     */
    public async measureDuration(audio: Uint8Array, mimeType: string = "audio/mpeg"): Promise<number | null> {
        if (audio.length === 0) return null;

        try {
            const metadata = await parseBuffer(audio, { mimeType, size: audio.length }, { duration: true, skipCovers: true });
            const seconds = metadata.format.duration;

            if (seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
                Logger.warn(`[Metadata] No duration in ${audio.length} bytes of ${mimeType}`);
                return null;
            }
            return seconds * 1000;
        } catch (error) {
            Logger.warn(`[Metadata] Failed to parse ${audio.length} bytes of ${mimeType}`, error);
            return null;
        }
    }
}
