import type { WordEntry } from '../../core/models/WordTimeline';

export type TextPiece =
    | { kind: 'text'; text: string }
    | { kind: 'word'; text: string; wordIndex: number };

/**
 * Cuts the source document into plain runs and clickable words.
 * Words without source text of their own (spoken cues) are skipped.
 */
export function splitIntoPieces(text: string, words: readonly WordEntry[]): TextPiece[] {
    const pieces: TextPiece[] = [];
    let cursor = 0;

    for (const word of words) {
        const { start, end } = word.originalRange;
        if (end <= start || start < cursor || end > text.length) continue;

        if (start > cursor) pieces.push({ kind: 'text', text: text.slice(cursor, start) });
        pieces.push({ kind: 'word', text: text.slice(start, end), wordIndex: word.wordIndex });
        cursor = end;
    }

    if (cursor < text.length) pieces.push({ kind: 'text', text: text.slice(cursor) });
    return pieces;
}

export function HighlightedText({ text, words, activeWordIndex, onWordClick }: {
    text: string,
    words: readonly WordEntry[],
    activeWordIndex: number,
    onWordClick?: (wordIndex: number) => void
}) {
    return (
        <div className="highlighted-text" style={{ whiteSpace: 'pre-wrap' }}>
            {splitIntoPieces(text, words).map((piece, idx) => {
                if (piece.kind === 'text') return piece.text;

                const onClick = onWordClick ? () => onWordClick(piece.wordIndex) : undefined;
                if (piece.wordIndex === activeWordIndex) {
                    return (
                        <mark key={idx} data-word-index={piece.wordIndex} onClick={onClick} style={{ background: '#4caf50', color: '#fff' }}>
                            {piece.text}
                        </mark>
                    );
                }
                return (
                    <span key={idx} data-word-index={piece.wordIndex} onClick={onClick} style={onClick ? { cursor: 'pointer' } : undefined}>
                        {piece.text}
                    </span>
                );
            })}
        </div>
    );
}
