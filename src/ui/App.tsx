import { useEffect, useState } from 'react';
import { loadConfig } from '../core/config/SpeechConfig';
import type { VoiceInfo } from '../core/interfaces/SynthesisBackend';
import { HttpSynthesisProvider } from '../core/providers/HttpSynthesisProvider';
import type { GenerationProgress } from '../core/services/SpeechGenerator';
import { SpeechSession } from '../core/services/SpeechSession';
import { Logger } from '../core/utils/Logger';
import { listVoiceAliases } from '../core/utils/VoiceOptions';
import { HtmlAudioPlayer, type MediaElementLike } from './adapters/HtmlAudioPlayer';
import { LogPane } from './components/LogPane';
import { ReaderView } from './components/ReaderView';

const SAMPLE_TEXT = '# Welcome\n\nPaste some **Markdown** here and press *Generate*.';
const VOICE_LANGUAGES = ['en', 'fr'];

/**
 * Session for the browser: speech from `endpoint`, audio through `element`.
 */
export function createBrowserSession(endpoint: string, element: MediaElementLike): SpeechSession {
    const config = loadConfig();
    return new SpeechSession({
        backend: new HttpSynthesisProvider({ endpoint }),
        player: new HtmlAudioPlayer(element),
        config
    });
}

export default function App({ session }: { session: SpeechSession }) {
    const [text, setText] = useState(SAMPLE_TEXT);
    const [voice, setVoice] = useState('alloy');
    const [voices, setVoices] = useState<VoiceInfo[]>([]);
    const [markdownEnabled, setMarkdownEnabled] = useState(true);
    const [isGenerating, setIsGenerating] = useState(false);
    const [progress, setProgress] = useState<GenerationProgress | null>(null);
    const [statusMsg, setStatusMsg] = useState('');

    useEffect(() => {
        let cancelled = false;
        session.listVoices(VOICE_LANGUAGES)
            .then(list => {
                if (!cancelled) setVoices(list);
            })
            .catch((e: unknown) => {
                Logger.warn(`[App] Could not load voices: ${e instanceof Error ? e.message : String(e)}`);
            });
        return () => {
            cancelled = true;
        };
    }, [session]);

    const handleGenerate = async () => {
        setIsGenerating(true);
        setProgress(null);
        setStatusMsg('Synthesizing...');
        try {
            const result = await session.generate(text, { voice, markdown: markdownEnabled }, setProgress);
            // A newer click took over; its own handler reports the status
            if (!result) return;
            setStatusMsg(`Ready: ${result.index.words.length} words, ${(result.index.totalDurationMs / 1000).toFixed(1)}s`);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            Logger.error(`[App] Generation failed: ${message}`);
            setStatusMsg(`Failed: ${message}`);
        } finally {
            setIsGenerating(false);
        }
    };

    return (
        <div className="app" style={{ maxWidth: '900px', margin: '0 auto', padding: '20px', fontFamily: 'sans-serif' }}>
            <h1>Speakmark</h1>

            <textarea
                value={text}
                onChange={e => setText(e.target.value)}
                rows={8}
                style={{ width: '100%', boxSizing: 'border-box', fontFamily: 'monospace' }}
            />

            <div className="generate-controls" style={{ display: 'flex', gap: '10px', margin: '10px 0', alignItems: 'center' }}>
                <select value={voice} onChange={e => setVoice(e.target.value)} title="Voice">
                    {listVoiceAliases().map(alias => <option key={alias} value={alias}>{alias}</option>)}
                    {voices.map(v => <option key={v.name} value={v.name}>{v.name} ({v.gender})</option>)}
                </select>
                <label>
                    <input type="checkbox" checked={markdownEnabled} onChange={e => setMarkdownEnabled(e.target.checked)} /> Markdown
                </label>
                <button onClick={handleGenerate} disabled={isGenerating}>Generate</button>
                {progress && isGenerating && (
                    <span style={{ fontSize: '0.8em', color: '#888' }}>{progress.completed}/{progress.total} segments</span>
                )}
                {statusMsg && <span className="status" style={{ fontSize: '0.8em' }}>{statusMsg}</span>}
            </div>

            <ReaderView session={session} />
            <LogPane />
        </div>
    );
}
