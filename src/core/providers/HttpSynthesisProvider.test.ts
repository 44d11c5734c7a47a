import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpSynthesisProvider } from './HttpSynthesisProvider';
import { SpeechError, SynthesisError } from '../errors/SpeechErrors';
import type { SynthesisRequest } from '../interfaces/SynthesisBackend';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpSynthesisProvider', () => {
    let provider: HttpSynthesisProvider;
    const fetchMock = vi.fn();
    const request: SynthesisRequest = { segmentId: 2, text: 'Hello world', voice: 'en-US-JennyNeural', rate: '+0%' };

    beforeEach(() => {
        provider = new HttpSynthesisProvider({
            endpoint: 'http://localhost:8080/synthesize',
            headers: { Authorization: 'Bearer test-secret' }
        });
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should be named HTTP', () => {
        expect(provider.name).toBe('HTTP');
    });

    it('should post the request as JSON', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ audio: '', boundaries: [] }));
        const controller = new AbortController();

        await provider.synthesize({ ...request, signal: controller.signal });

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://localhost:8080/synthesize');
        expect(init.method).toBe('POST');
        expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
        expect(JSON.parse(init.body)).toEqual({ text: 'Hello world', voice: 'en-US-JennyNeural', rate: '+0%' });
        expect(init.signal).toBe(controller.signal);
    });

    it('should decode audio and convert ticks to milliseconds', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({
            audio: 'AQID',
            durationMs: 1500,
            mimeType: 'audio/mpeg',
            boundaries: [
                { offset: 5_000_000, duration: 2_000_000, text: 'world', textOffset: 6 },
                { offset: 0, duration: 4_000_000, text: 'Hello', textOffset: 0 }
            ]
        }));

        const result = await provider.synthesize(request);

        expect(Array.from(result.audio)).toEqual([1, 2, 3]);
        expect(result.durationMs).toBe(1500);
        expect(result.mimeType).toBe('audio/mpeg');
        expect(result.boundaries).toEqual([
            { textOffset: 6, audioTime: 500, duration: 200, text: 'world' },
            { textOffset: 0, audioTime: 0, duration: 400, text: 'Hello' }
        ]);
    });

    it('should default missing boundaries to none', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ audio: 'AQID' }));
        const result = await provider.synthesize(request);
        expect(result.boundaries).toEqual([]);
        expect(result.durationMs).toBeUndefined();
    });

    it('should report the status of a failed request', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503));

        const error = await provider.synthesize(request).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SynthesisError);
        expect(error).toMatchObject({ status: 503, segmentId: 2, code: 'SYNTHESIS' });
    });

    it('should reject a malformed response', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ audio: 42 }));
        await expect(provider.synthesize(request)).rejects.toThrow(/malformed response \(audio: /);
    });

    it('should reject a body that is not JSON', async () => {
        fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));
        await expect(provider.synthesize(request)).rejects.toThrow('[Synthesis] segment 2: response is not JSON');
    });

    it('should wrap network errors', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        const error = await provider.synthesize(request).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SynthesisError);
        expect(error).toMatchObject({ message: '[Synthesis] segment 2: request failed: fetch failed', status: undefined });
    });

    describe('listVoices', () => {
        const voices = [
            { name: 'en-US-JennyNeural', gender: 'Female', locale: 'en-US' },
            { name: 'fr-FR-HenriNeural', gender: 'Male', locale: 'fr-FR' },
            { name: 'es-MX-DaliaNeural', locale: 'es-MX' }
        ];

        it('should get the voice list beside the synthesis endpoint', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse(voices));

            const result = await provider.listVoices();

            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe('http://localhost:8080/voices');
            expect(init.headers).toEqual({ Authorization: 'Bearer test-secret' });
            expect(result).toEqual([{ name: 'en-US-JennyNeural', gender: 'Female', language: 'en-US' }]);
        });

        it('should filter by the requested locales', async () => {
            fetchMock.mockResolvedValue(jsonResponse(voices));

            expect((await provider.listVoices(['fr', 'es'])).map(v => v.name)).toEqual(['fr-FR-HenriNeural', 'es-MX-DaliaNeural']);
        });

        it('should keep every voice for "all"', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse(voices));

            const result = await provider.listVoices('all');

            expect(result).toHaveLength(3);
            expect(result[2]).toEqual({ name: 'es-MX-DaliaNeural', gender: 'Unknown', language: 'es-MX' });
        });

        it('should use an explicit voices endpoint', async () => {
            const custom = new HttpSynthesisProvider({ endpoint: 'http://localhost:8080/synthesize', voicesEndpoint: 'http://localhost:9090/list' });
            fetchMock.mockResolvedValueOnce(jsonResponse([]));

            await custom.listVoices();

            expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:9090/list');
        });

        it('should reject failed and malformed responses', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({}, 500));
            await expect(provider.listVoices()).rejects.toThrow('[Voices] backend returned status 500');

            fetchMock.mockResolvedValueOnce(jsonResponse([{ name: 'x' }]));
            const error = await provider.listVoices().catch((e: unknown) => e);
            expect(error).toBeInstanceOf(SpeechError);
            expect(error).toMatchObject({ code: 'SYNTHESIS', message: '[Voices] malformed voice list (1 issues)' });
        });
    });
});
