import type { TextNormalizer } from "../interfaces/TextNormalizer";
import type { NormalizedText } from "../models/SpeechData";
import { OffsetMapBuilder } from "../utils/OffsetMapBuilder";
import { assertWellFormed } from "../utils/TextEncoding";
import { isAsciiPunctuation, isWhitespace, isWordChar } from "../utils/TextPatterns";

export interface MarkdownNormalizerOptions {
    /**
     * Announce structure the listener cannot see ("Title — …", "code snippet: …").
     * Defaults to true.
     */
    contextHints?: boolean;
}

interface OpenFence {
    marker: string;
    length: number;
}

interface LinkSpan {
    /** Index of the `]` closing the label. */
    labelEnd: number;
    /** Index just after the destination or reference. */
    linkEnd: number;
}

const HEADER_CUES = ["Title — ", "Section — ", "Subsection — "];
const CODE_SPAN_CUE = "code snippet: ";
const CODE_BLOCK_CUE = "(code block omitted)";
const IMAGE_CUE = "Image";

// Tags that separate words when removed
const BLOCK_TAGS = new Set(["br", "p", "div", "li", "tr", "td", "th", "h1", "h2", "h3", "h4", "h5", "h6", "hr"]);

/**
 * Strips Markdown down to the words a listener should hear.
 *
 * Block structure is handled line by line (fences, headers, quotes, lists,
 * rules, tables), inline markup by a single left-to-right scan. Anything
 * that does not parse as markup is read literally, so unusual input never
 * fails.
 */
export class MarkdownNormalizer implements TextNormalizer {
    private static FENCE_REGEX = /^ {0,3}(`{3,}|~{3,})(.*)$/;
    private static ATX_REGEX = /^ {0,3}(#{1,6})(?=[ \t]|$)/;
    private static CLOSING_HASHES_REGEX = /(?:^|[ \t]+)#+[ \t]*$/;
    private static HR_REGEX = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
    private static SETEXT_REGEX = /^ {0,3}=+[ \t]*$/;
    private static TABLE_DELIMITER_REGEX = /^[ \t]*\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)+\|?[ \t]*$/;
    private static QUOTE_REGEX = /^ {0,3}>[ \t]?/;
    private static LIST_REGEX = /^[ \t]*(?:[-*+]|\d{1,9}[.)])(?:[ \t]+|$)(?:\[[ xX]\][ \t]+)?/;
    private static AUTOLINK_REGEX = /^<((?:https?|ftp|mailto):[^\s<>]+|[^\s<>@]+@[^\s<>@]+\.[^\s<>@]+)>/i;
    private static HTML_TAG_REGEX = /^<\/?([A-Za-z][A-Za-z0-9-]*)(?:\s[^<>]*)?\/?>/;

    private readonly contextHints: boolean;

    constructor(options: MarkdownNormalizerOptions = {}) {
        this.contextHints = options.contextHints ?? true;
    }

    public normalize(rawText: string): NormalizedText {
        assertWellFormed(rawText);

        const builder = new OffsetMapBuilder();
        let fence: OpenFence | null = null;
        let lineStart = 0;

        while (lineStart <= rawText.length) {
            const newline = rawText.indexOf("\n", lineStart);
            const lineEnd = newline === -1 ? rawText.length : newline;
            let contentEnd = lineEnd;
            if (contentEnd > lineStart && rawText[contentEnd - 1] === "\r") contentEnd--;

            const inFence: boolean = fence !== null;
            fence = this.processLine(builder, rawText, lineStart, contentEnd, fence);

            // Line terminator (\r\n or \n)
            if (newline !== -1) {
                if (inFence || fence !== null) {
                    builder.remove(contentEnd, newline + 1);
                } else {
                    builder.text(rawText.slice(contentEnd, newline + 1), contentEnd);
                }
            }

            lineStart = newline === -1 ? rawText.length + 1 : newline + 1;
        }

        const { spokenText, offsetMap } = builder.finish();
        return { originalText: rawText, spokenText, offsetMap };
    }

    /**
     * Handles one line's block structure and returns the fence state after it.
     */
    private processLine(
        builder: OffsetMapBuilder,
        raw: string,
        start: number,
        end: number,
        fence: OpenFence | null
    ): OpenFence | null {
        const line = raw.slice(start, end);

        if (fence) {
            builder.remove(start, end);
            const close = MarkdownNormalizer.FENCE_REGEX.exec(line);
            if (close && close[1][0] === fence.marker && close[1].length >= fence.length && close[2].trim() === "") {
                builder.breakParagraph(end);
                return null;
            }
            return fence;
        }

        const open = MarkdownNormalizer.FENCE_REGEX.exec(line);
        if (open && !(open[1][0] === "`" && open[2].includes("`"))) {
            builder.breakParagraph(start);
            if (this.contextHints) builder.insert(CODE_BLOCK_CUE, start);
            builder.remove(start, end);
            return { marker: open[1][0], length: open[1].length };
        }

        if (line.trim() === "") {
            builder.text(line, start);
            return null;
        }

        if (MarkdownNormalizer.HR_REGEX.test(line) || MarkdownNormalizer.SETEXT_REGEX.test(line)) {
            builder.remove(start, end);
            builder.breakParagraph(end);
            return null;
        }

        if (MarkdownNormalizer.TABLE_DELIMITER_REGEX.test(line)) {
            builder.remove(start, end, true);
            return null;
        }

        let cursor = start;
        let quote: RegExpExecArray | null;
        while ((quote = MarkdownNormalizer.QUOTE_REGEX.exec(raw.slice(cursor, end))) !== null) {
            builder.remove(cursor, cursor + quote[0].length);
            cursor += quote[0].length;
        }

        const header = MarkdownNormalizer.ATX_REGEX.exec(raw.slice(cursor, end));
        if (header) {
            this.processHeader(builder, raw, cursor, cursor + header[0].length, end, header[1].length);
            return null;
        }

        const list = MarkdownNormalizer.LIST_REGEX.exec(raw.slice(cursor, end));
        if (list) {
            builder.remove(cursor, cursor + list[0].length);
            cursor += list[0].length;
        }

        const tableRow = raw.slice(cursor, end).trimStart().startsWith("|");
        this.inline(builder, raw, cursor, end, tableRow);
        return null;
    }

    private processHeader(
        builder: OffsetMapBuilder,
        raw: string,
        markerStart: number,
        markerEnd: number,
        end: number,
        level: number
    ) {
        let contentStart = markerEnd;
        while (contentStart < end && isWhitespace(raw[contentStart])) contentStart++;

        builder.remove(markerStart, contentStart);
        builder.breakParagraph(markerStart);

        let contentEnd = end;
        const closing = MarkdownNormalizer.CLOSING_HASHES_REGEX.exec(raw.slice(contentStart, end));
        if (closing) contentEnd = contentStart + closing.index;
        while (contentEnd > contentStart && isWhitespace(raw[contentEnd - 1])) contentEnd--;

        if (contentEnd > contentStart) {
            if (this.contextHints) {
                builder.insert(HEADER_CUES[Math.min(level, 3) - 1], contentStart);
            }
            this.inline(builder, raw, contentStart, contentEnd, false);
        }

        builder.remove(contentEnd, end);
        builder.breakParagraph(end);
    }

    /**
     * Scans inline markup in `[start, end)`; literal runs are copied as they are.
     */
    private inline(builder: OffsetMapBuilder, raw: string, start: number, end: number, tableRow: boolean): void {
        let i = start;
        let literalStart = start;
        const flush = (upTo: number) => {
            if (upTo > literalStart) builder.textWithoutEmoji(raw, literalStart, upTo);
        };

        while (i < end) {
            const ch = raw[i];

            if (ch === "\\" && i + 1 < end && isAsciiPunctuation(raw[i + 1])) {
                flush(i);
                builder.remove(i, i + 1);
                literalStart = i + 1;
                i += 2;
                continue;
            }

            if (ch === "`") {
                let n = 1;
                while (i + n < end && raw[i + n] === "`") n++;
                const close = this.findCodeSpanEnd(raw, i + n, end, n);
                if (close !== -1) {
                    flush(i);
                    let contentStart = i + n;
                    let contentEnd = close;
                    while (contentStart < contentEnd && raw[contentStart] === " ") contentStart++;
                    while (contentEnd > contentStart && raw[contentEnd - 1] === " ") contentEnd--;

                    builder.remove(i, contentStart);
                    if (contentEnd > contentStart) {
                        if (this.contextHints) builder.insert(CODE_SPAN_CUE, contentStart);
                        builder.textWithoutEmoji(raw, contentStart, contentEnd);
                    }
                    builder.remove(contentEnd, close + n);
                    i = close + n;
                    literalStart = i;
                    continue;
                }
                i += n;
                continue;
            }

            if (ch === "!" && i + 1 < end && raw[i + 1] === "[") {
                const link = this.parseLink(raw, i + 1, end);
                if (link) {
                    flush(i);
                    const altStart = i + 2;
                    const hasAlt = raw.slice(altStart, link.labelEnd).trim() !== "";
                    builder.remove(i, altStart);
                    if (this.contextHints) builder.insert(hasAlt ? `${IMAGE_CUE}: ` : IMAGE_CUE, altStart);
                    if (hasAlt) this.inline(builder, raw, altStart, link.labelEnd, false);
                    builder.remove(link.labelEnd, link.linkEnd);
                    i = link.linkEnd;
                    literalStart = i;
                    continue;
                }
                i++;
                continue;
            }

            if (ch === "[") {
                if (raw[i + 1] === "^") {
                    const close = raw.indexOf("]", i + 2);
                    if (close !== -1 && close < end) {
                        flush(i);
                        builder.remove(i, close + 1);
                        i = close + 1;
                        literalStart = i;
                        continue;
                    }
                }
                const link = this.parseLink(raw, i, end);
                if (link) {
                    flush(i);
                    builder.remove(i, i + 1);
                    this.inline(builder, raw, i + 1, link.labelEnd, false);
                    builder.remove(link.labelEnd, link.linkEnd);
                    i = link.linkEnd;
                    literalStart = i;
                    continue;
                }
                i++;
                continue;
            }

            if (ch === "<") {
                const rest = raw.slice(i, end);
                if (rest.startsWith("<!--")) {
                    const close = rest.indexOf("-->");
                    if (close !== -1) {
                        flush(i);
                        builder.remove(i, i + close + 3);
                        i += close + 3;
                        literalStart = i;
                        continue;
                    }
                }
                const auto = MarkdownNormalizer.AUTOLINK_REGEX.exec(rest);
                if (auto) {
                    flush(i);
                    builder.remove(i, i + 1);
                    builder.text(auto[1], i + 1);
                    builder.remove(i + 1 + auto[1].length, i + auto[0].length);
                    i += auto[0].length;
                    literalStart = i;
                    continue;
                }
                const tag = MarkdownNormalizer.HTML_TAG_REGEX.exec(rest);
                if (tag) {
                    flush(i);
                    builder.remove(i, i + tag[0].length, BLOCK_TAGS.has(tag[1].toLowerCase()));
                    i += tag[0].length;
                    literalStart = i;
                    continue;
                }
                i++;
                continue;
            }

            if (ch === "*" || ch === "_" || ch === "~") {
                let n = 1;
                while (i + n < end && raw[i + n] === ch) n++;
                const before = i > 0 ? raw[i - 1] : undefined;
                const after = i + n < end ? raw[i + n] : undefined;
                if (this.isEmphasisDelimiter(ch, n, before, after)) {
                    flush(i);
                    builder.remove(i, i + n);
                    literalStart = i + n;
                }
                i += n;
                continue;
            }

            if (tableRow && ch === "|") {
                flush(i);
                builder.remove(i, i + 1, true);
                i++;
                literalStart = i;
                continue;
            }

            i++;
        }

        flush(end);
    }

    private isEmphasisDelimiter(ch: string, run: number, before: string | undefined, after: string | undefined): boolean {
        if (ch === "~") return run >= 2;
        if (ch === "_") return !(isWordChar(before) && isWordChar(after));

        // A lone "*" between spaces or between two word characters is literal (a * b, 2*3).
        const spacedBefore = before === undefined || isWhitespace(before);
        const spacedAfter = after === undefined || isWhitespace(after);
        if (spacedBefore && spacedAfter) return false;
        return !(run === 1 && isWordChar(before) && isWordChar(after));
    }

    private findCodeSpanEnd(raw: string, from: number, end: number, run: number): number {
        let j = from;
        while (j < end) {
            if (raw[j] !== "`") {
                j++;
                continue;
            }
            let k = j;
            while (k < end && raw[k] === "`") k++;
            if (k - j === run) return j;
            j = k;
        }
        return -1;
    }

    /**
     * Matches `[label](destination)` or `[label][ref]` starting at `open`.
     */
    private parseLink(raw: string, open: number, end: number): LinkSpan | null {
        const labelEnd = this.findClosing(raw, open, end, "[", "]");
        if (labelEnd === -1) return null;

        const next = raw[labelEnd + 1];
        if (next === "(" && labelEnd + 1 < end) {
            const close = this.findClosing(raw, labelEnd + 1, end, "(", ")");
            return close === -1 ? null : { labelEnd, linkEnd: close + 1 };
        }
        if (next === "[" && labelEnd + 1 < end) {
            const close = raw.indexOf("]", labelEnd + 2);
            return close === -1 || close >= end ? null : { labelEnd, linkEnd: close + 1 };
        }
        return null;
    }

    private findClosing(raw: string, open: number, end: number, opener: string, closer: string): number {
        let depth = 0;
        for (let i = open; i < end; i++) {
            const c = raw[i];
            if (c === "\\") {
                i++;
                continue;
            }
            if (c === opener) {
                depth++;
            } else if (c === closer) {
                depth--;
                if (depth === 0) return i;
            }
        }
        return -1;
    }
}
