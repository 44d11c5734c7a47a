import { useEffect, useRef, useState } from 'react';
import { saveAs } from 'file-saver';
import type { SpeechSession } from '../../core/services/SpeechSession';
import { Logger } from '../../core/utils/Logger';
import { useActiveWord } from '../hooks/useActiveWord';
import { HighlightedText } from './HighlightedText';

const RATES = [0.75, 1, 1.25, 1.5, 2];

/**
 * Transport controls plus the source document with the spoken word highlighted.
 * Clicking a word seeks to it.
 */
export function ReaderView({ session, autoScroll = true }: {
    session: SpeechSession,
    autoScroll?: boolean
}) {
    const snapshot = useActiveWord(session.getEngine());
    const [isExporting, setIsExporting] = useState(false);
    const containerRef = useRef<HTMLDivElement>(null);

    // Snapshot generation changes whenever a new result is loaded
    const result = snapshot.generation === session.getCurrent()?.generation ? session.getCurrent() : null;

    useEffect(() => {
        if (autoScroll && snapshot.wordIndex !== -1 && containerRef.current) {
            const activeEl = containerRef.current.querySelector(`[data-word-index="${snapshot.wordIndex}"]`);
            activeEl?.scrollIntoView({ behavior: 'smooth', block: 'center' });
        }
    }, [snapshot.wordIndex, autoScroll]);

    const handlePlayPause = () => {
        if (snapshot.state === 'playing') {
            session.pause();
            return;
        }
        session.play().catch((e: unknown) => {
            Logger.error(`[ReaderView] Playback failed: ${e instanceof Error ? e.message : String(e)}`);
        });
    };

    const handleWordClick = (wordIndex: number) => {
        session.seekToWord(wordIndex);
    };

    const handleExport = async () => {
        setIsExporting(true);
        try {
            const archive = await session.exportCurrent();
            if (archive) {
                saveAs(new Blob([new Uint8Array(archive)], { type: 'application/zip' }), 'speech_export.zip');
            }
        } catch (e) {
            Logger.error(`[ReaderView] Export failed: ${e instanceof Error ? e.message : String(e)}`);
        } finally {
            setIsExporting(false);
        }
    };

    if (!result) {
        return (
            <div className="reader-view" style={{ color: '#555', padding: '20px', textAlign: 'center' }}>
                Nothing generated yet.
            </div>
        );
    }

    return (
        <div className="reader-view" style={{ padding: '20px' }}>
            <div className="reader-controls" style={{ display: 'flex', gap: '10px', marginBottom: '10px', alignItems: 'center' }}>
                <button onClick={handlePlayPause}>{snapshot.state === 'playing' ? 'Pause' : 'Play'}</button>
                <button onClick={() => session.stop()}>Stop</button>
                <select value={snapshot.rate} onChange={e => session.setRate(Number(e.target.value))} title="Speed">
                    {RATES.map(rate => <option key={rate} value={rate}>{rate}x</option>)}
                </select>
                <button onClick={handleExport} disabled={isExporting}>{isExporting ? 'Exporting...' : 'Export'}</button>
            </div>

            {result.failedSegments.length > 0 && (
                <div className="reader-warning" style={{ color: '#ff9800', fontSize: '0.8em', marginBottom: '10px' }}>
                    {result.failedSegments.length} of {result.segments.length} segments could not be synthesized; their timing is estimated.
                </div>
            )}

            <div ref={containerRef} style={{ maxHeight: '400px', overflowY: 'auto', border: '1px solid #444', background: '#1a1a1a', padding: '20px', borderRadius: '8px', color: '#ccc' }}>
                <HighlightedText
                    text={result.normalized.originalText}
                    words={result.index.words}
                    activeWordIndex={snapshot.wordIndex}
                    onWordClick={handleWordClick}
                />
            </div>
        </div>
    );
}
