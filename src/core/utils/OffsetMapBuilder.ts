import type { OffsetRange } from "../models/SpeechData";
import { emojiWidthAt, isWhitespace } from "./TextPatterns";

/** Whitespace and removed markup seen since the last emitted character. */
interface PendingGap {
    start: number;
    end: number;
    newlines: number;
    spaced: boolean;
}

/**
 * Writes spoken text left to right while recording where every character
 * came from in the source document.
 *
 * Whitespace and removed markup are not written immediately: they pile up
 * in a gap that collapses to a single separator (`" "`, `"\n"` or `"\n\n"`)
 * when the next visible character arrives. A gap at the very start or end
 * of the document produces no separator.
 */
export class OffsetMapBuilder {
    private out = "";
    private ranges: OffsetRange[] = [];
    private gap: PendingGap | null = null;

    /**
     * Copies source text verbatim. Whitespace inside it is collapsed.
     * @param chunk Slice of the source document.
     * @param originalStart Offset of `chunk[0]` in the source document.
     */
    public text(chunk: string, originalStart: number): void {
        for (let i = 0; i < chunk.length; i++) {
            const ch = chunk[i];
            const pos = originalStart + i;
            if (isWhitespace(ch)) {
                this.extendGap(pos, pos + 1, ch === "\n" ? 1 : 0, true);
            } else {
                this.flushGap();
                this.pushCopied(ch, pos);
            }
        }
    }

    /**
     * Copies source text, dropping emoji.
     */
    public textWithoutEmoji(source: string, start: number, end: number): void {
        let runStart = start;
        let i = start;
        while (i < end) {
            const width = emojiWidthAt(source, i);
            if (width > 0) {
                if (i > runStart) this.text(source.slice(runStart, i), runStart);
                this.remove(i, i + width);
                i += width;
                runStart = i;
            } else {
                i++;
            }
        }
        if (end > runStart) this.text(source.slice(runStart, end), runStart);
    }

    /**
     * Drops a span of markup.
     * @param spaced The markup separated words (a table pipe, a `<br>`).
     */
    public remove(start: number, end: number, spaced = false): void {
        if (end <= start && !spaced) return;
        this.extendGap(start, Math.max(start, end), 0, spaced);
    }

    /** Forces the next separator to be a paragraph break. */
    public breakParagraph(at: number): void {
        this.extendGap(at, at, 2, true);
    }

    /**
     * Writes text that has no source counterpart (a spoken cue).
     * @param at Source position the inserted text is attributed to.
     */
    public insert(text: string, at: number): void {
        if (!text) return;
        this.flushGap();
        const n = this.out.length;
        this.out += text;

        const last = this.ranges[this.ranges.length - 1];
        if (
            last &&
            last.normalizedEnd === n &&
            last.normalizedEnd > last.normalizedStart &&
            last.originalStart === at &&
            last.originalEnd === at
        ) {
            last.normalizedEnd = n + text.length;
            return;
        }
        this.ranges.push({ normalizedStart: n, normalizedEnd: n + text.length, originalStart: at, originalEnd: at });
    }

    public get length(): number {
        return this.out.length;
    }

    public finish(): { spokenText: string; offsetMap: OffsetRange[] } {
        const gap = this.gap;
        if (gap && gap.end > gap.start) {
            const n = this.out.length;
            this.ranges.push({ normalizedStart: n, normalizedEnd: n, originalStart: gap.start, originalEnd: gap.end });
        }
        this.gap = null;
        return { spokenText: this.out, offsetMap: this.ranges };
    }

    private extendGap(start: number, end: number, newlines: number, spaced: boolean) {
        if (!this.gap) {
            this.gap = { start, end, newlines, spaced };
            return;
        }
        this.gap.start = Math.min(this.gap.start, start);
        this.gap.end = Math.max(this.gap.end, end);
        this.gap.newlines += newlines;
        this.gap.spaced = this.gap.spaced || spaced;
    }

    private flushGap() {
        const gap = this.gap;
        if (!gap) return;
        this.gap = null;

        const n = this.out.length;
        const endsWithSpace = n > 0 && isWhitespace(this.out[n - 1]);
        if (n > 0 && gap.spaced && !endsWithSpace) {
            const separator = gap.newlines >= 2 ? "\n\n" : gap.newlines === 1 ? "\n" : " ";
            this.out += separator;
            this.ranges.push({
                normalizedStart: n,
                normalizedEnd: n + separator.length,
                originalStart: gap.start,
                originalEnd: gap.end
            });
        } else if (gap.end > gap.start) {
            this.ranges.push({ normalizedStart: n, normalizedEnd: n, originalStart: gap.start, originalEnd: gap.end });
        }
    }

    private pushCopied(ch: string, pos: number) {
        const n = this.out.length;
        this.out += ch;

        const last = this.ranges[this.ranges.length - 1];
        if (
            last &&
            last.normalizedEnd === n &&
            last.originalEnd === pos &&
            last.normalizedEnd - last.normalizedStart === last.originalEnd - last.originalStart &&
            last.normalizedEnd > last.normalizedStart
        ) {
            last.normalizedEnd++;
            last.originalEnd++;
            return;
        }
        this.ranges.push({ normalizedStart: n, normalizedEnd: n + 1, originalStart: pos, originalEnd: pos + 1 });
    }
}
