import { describe, it, expect } from 'vitest';
import { AudioMetadataService } from './AudioMetadataService';

/** Mono 8-bit PCM WAV of silence. */
function createWav(sampleRate: number, samples: number): Uint8Array {
    const bytes = new Uint8Array(44 + samples);
    const view = new DataView(bytes.buffer);
    const ascii = (offset: number, text: string) => {
        for (let i = 0; i < text.length; i++) bytes[offset + i] = text.charCodeAt(i);
    };

    ascii(0, 'RIFF');
    view.setUint32(4, 36 + samples, true);
    ascii(8, 'WAVE');
    ascii(12, 'fmt ');
    view.setUint32(16, 16, true);
    view.setUint16(20, 1, true); // PCM
    view.setUint16(22, 1, true); // mono
    view.setUint32(24, sampleRate, true);
    view.setUint32(28, sampleRate, true); // byte rate
    view.setUint16(32, 1, true); // block align
    view.setUint16(34, 8, true); // bits per sample
    ascii(36, 'data');
    view.setUint32(40, samples, true);
    bytes.fill(128, 44);

    return bytes;
}

describe('AudioMetadataService', () => {
    const service = new AudioMetadataService();

    it('should measure the duration of a WAV chunk', async () => {
        const duration = await service.measureDuration(createWav(8000, 4000), 'audio/wav');
        expect(duration).toBe(500);
    });

    it('should return null for empty audio', async () => {
        expect(await service.measureDuration(new Uint8Array(0))).toBeNull();
    });

    it('should return null for data it cannot parse', async () => {
        expect(await service.measureDuration(new Uint8Array(64), 'application/octet-stream')).toBeNull();
    });
});
