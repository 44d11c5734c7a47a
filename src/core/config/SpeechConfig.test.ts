import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, type SpeechConfig } from './SpeechConfig';
import { ConfigError } from '../errors/SpeechErrors';

describe('loadConfig', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.unstubAllGlobals();
    });

    it('should fall back to the defaults', () => {
        expect(loadConfig({})).toEqual({ ...DEFAULT_CONFIG });
    });

    it('should read the environment', () => {
        const config = loadConfig({
            SPEECH_MAX_CHARS: '500',
            SPEECH_CONTEXT_HINTS: 'No',
            SPEECH_LOG_LEVEL: 'debug',
            SPEECH_DEFAULT_VOICE: 'onyx'
        });

        expect(config.maxCharsPerSegment).toBe(500);
        expect(config.contextHints).toBe(false);
        expect(config.logLevel).toBe('debug');
        expect(config.defaultVoice).toBe('onyx');
    });

    it('should read process.env by default', () => {
        vi.stubEnv('SPEECH_MAX_CHARS', '700');
        expect(loadConfig().maxCharsPerSegment).toBe(700);
    });

    it('should use the defaults where there is no process', () => {
        vi.stubGlobal('process', undefined);
        let config: SpeechConfig | null = null;
        try {
            config = loadConfig();
        } finally {
            vi.unstubAllGlobals();
        }
        expect(config).toEqual({ ...DEFAULT_CONFIG });
    });

    it('should cap concurrency at eight', () => {
        expect(loadConfig({ SPEECH_CONCURRENCY: '20' }).synthesisConcurrency).toBe(8);
    });

    it('should ignore blank variables', () => {
        expect(loadConfig({ SPEECH_DEFAULT_VOICE: '  ' }).defaultVoice).toBe('alloy');
    });

    it('should let overrides win over the environment', () => {
        expect(loadConfig({ SPEECH_RETRIES: '5' }, { synthesisRetries: 1 }).synthesisRetries).toBe(1);
    });

    it('should reject invalid values', () => {
        expect(() => loadConfig({ SPEECH_MAX_CHARS: 'lots' })).toThrow(ConfigError);
        expect(() => loadConfig({ SPEECH_MAX_CHARS: 'lots' })).toThrow(/maxCharsPerSegment/);
        expect(() => loadConfig({ SPEECH_DEFAULT_RATE: '3' })).toThrow(/defaultRate/);
        expect(() => loadConfig({}, { synthesisConcurrency: 0 })).toThrow(/synthesisConcurrency/);
    });
});
