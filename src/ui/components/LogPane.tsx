import { useEffect, useRef, useState } from 'react';
import { Logger, type LogEntry } from '../../core/utils/Logger';

const MAX_ENTRIES = 100;

export function LogPane() {
    const [logs, setLogs] = useState<LogEntry[]>([]);
    const containerRef = useRef<HTMLDivElement>(null);

    useEffect(() => {
        return Logger.subscribe((entry) => {
            setLogs(prev => {
                const next = [...prev, entry];
                return next.length > MAX_ENTRIES ? next.slice(next.length - MAX_ENTRIES) : next;
            });
        });
    }, []);

    // Keep the newest entry in view
    useEffect(() => {
        if (containerRef.current) {
            containerRef.current.scrollTop = containerRef.current.scrollHeight;
        }
    }, [logs]);

    return (
        <div className="log-viewer" style={{ textAlign: 'left', border: '1px solid #333', background: '#111', padding: '10px', borderRadius: '4px' }}>
            <div style={{ fontSize: '0.8em', color: '#888', borderBottom: '1px solid #333', marginBottom: '5px', paddingBottom: '2px' }}>
                Logs (latest {MAX_ENTRIES})
            </div>
            <div ref={containerRef} style={{ maxHeight: '150px', overflowY: 'auto', fontFamily: 'monospace', fontSize: '12px' }}>
                {logs.map((log, i) => (
                    <div key={i} style={{ color: log.level === 'error' ? '#f44336' : log.level === 'warn' ? '#ff9800' : '#8bc34a', marginBottom: '2px' }}>
                        <span style={{ color: '#555', marginRight: '5px' }}>[{new Date(log.timestamp).toLocaleTimeString()}]</span>
                        <span style={{ fontWeight: 'bold', marginRight: '5px' }}>[{log.level.toUpperCase()}]</span>
                        {log.message}
                    </div>
                ))}
                {logs.length === 0 && <div style={{ color: '#555', fontStyle: 'italic' }}>No logs yet...</div>}
            </div>
        </div>
    );
}
