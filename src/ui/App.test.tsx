import { describe, it, expect, vi } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import App, { createBrowserSession } from './App';
import { SpeechSession } from '../core/services/SpeechSession';
import { MockSynthesisProvider } from '../core/providers/MockSynthesisProvider';
import { MockAudioPlayer } from '../core/providers/MockAudioPlayer';
import { DEFAULT_CONFIG } from '../core/config/SpeechConfig';
import type { MediaElementLike } from './adapters/HtmlAudioPlayer';

describe('App', () => {
    it('should compose the editor, reader and logs', () => {
        const session = new SpeechSession({
            backend: new MockSynthesisProvider(),
            player: new MockAudioPlayer(),
            config: DEFAULT_CONFIG
        });

        const html = renderToStaticMarkup(<App session={session} />);

        expect(html).toContain('<h1>Speakmark</h1>');
        expect(html).toContain('<option value="shimmer">shimmer</option>');
        expect(html).toContain('<button>Generate</button>');
        expect(html).toContain('Nothing generated yet.');
        expect(html).toContain('Logs (latest 100)');
    });

    it('should build a browser session around a media element', () => {
        const element: MediaElementLike = {
            src: '',
            currentTime: 0,
            duration: Number.NaN,
            playbackRate: 1,
            play: vi.fn(async () => undefined),
            pause: vi.fn(),
            load: vi.fn(),
            addEventListener: vi.fn(),
            removeEventListener: vi.fn()
        };

        const session = createBrowserSession('http://localhost:8080/synthesize', element);

        expect(session.getCurrent()).toBeNull();
        expect(element.addEventListener).toHaveBeenCalledWith('timeupdate', expect.any(Function));
        expect(element.addEventListener).toHaveBeenCalledWith('seeked', expect.any(Function));
    });
});
