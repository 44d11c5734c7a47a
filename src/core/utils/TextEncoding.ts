import { NormalizationError } from "../errors/SpeechErrors";

/**
 * Index of the first lone UTF-16 surrogate, or -1.
 */
export function findLoneSurrogate(text: string): number {
    for (let i = 0; i < text.length; i++) {
        const code = text.charCodeAt(i);
        if (code >= 0xd800 && code <= 0xdbff) {
            const next = text.charCodeAt(i + 1);
            if (next >= 0xdc00 && next <= 0xdfff) {
                i++;
                continue;
            }
            return i;
        }
        if (code >= 0xdc00 && code <= 0xdfff) return i;
    }
    return -1;
}

export function assertWellFormed(text: string): void {
    const bad = findLoneSurrogate(text);
    if (bad !== -1) {
        throw new NormalizationError("Lone UTF-16 surrogate", bad);
    }
}

/**
 * Byte offset of the first invalid UTF-8 sequence, or -1.
 * Rejects overlong forms, surrogates and code points above U+10FFFF.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
    let i = 0;
    while (i < bytes.length) {
        const b = bytes[i];
        if (b < 0x80) {
            i++;
            continue;
        }

        let need: number;
        let min: number;
        let cp: number;
        if (b >= 0xc2 && b <= 0xdf) {
            need = 1; min = 0x80; cp = b & 0x1f;
        } else if (b >= 0xe0 && b <= 0xef) {
            need = 2; min = 0x800; cp = b & 0x0f;
        } else if (b >= 0xf0 && b <= 0xf4) {
            need = 3; min = 0x10000; cp = b & 0x07;
        } else {
            return i;
        }

        if (i + need >= bytes.length) return i;

        for (let k = 1; k <= need; k++) {
            const c = bytes[i + k];
            if ((c & 0xc0) !== 0x80) return i;
            cp = (cp << 6) | (c & 0x3f);
        }

        if (cp < min || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) return i;
        i += need + 1;
    }
    return -1;
}

/**
 * Decodes a loaded document. A leading byte-order mark is dropped.
 */
export function decodeDocument(bytes: Uint8Array): string {
    const bad = findInvalidUtf8(bytes);
    if (bad !== -1) {
        throw new NormalizationError("Invalid UTF-8 byte sequence", bad);
    }
    return new TextDecoder("utf-8").decode(bytes);
}
