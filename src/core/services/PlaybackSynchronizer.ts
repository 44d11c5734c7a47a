import type { WordEntry, WordIndex } from "../models/WordTimeline";

/**
 * Handles time-based lookups in a word index.
 * Both directions are binary searches over `audioStart`.
 */
export class PlaybackSynchronizer {
    /**
     * Finds the word to highlight at the given time.
     * @param index Complete word index.
     * @param currentTimeMs Current playback time.
     * @returns The active word index, -1 before the first word. Past the end the last word stays active.
     */
    public findWordIndex(index: WordIndex, currentTimeMs: number): number {
        const words = index.words;
        if (words.length === 0 || Number.isNaN(currentTimeMs)) return -1;

        // Binary search to find the last word that starts <= currentTime
        let low = 0;
        let high = words.length - 1;
        let result = -1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            if (words[mid].audioStart <= currentTimeMs) {
                result = mid; // Candidate found
                low = mid + 1; // Try to find a later one that is still <= current
            } else {
                high = mid - 1;
            }
        }

        return result;
    }

    /**
     * Audio start of the given word.
     * @throws RangeError when `wordIndex` is outside the index.
     */
    public timeForWord(index: WordIndex, wordIndex: number): number {
        if (!Number.isInteger(wordIndex) || wordIndex < 0 || wordIndex >= index.words.length) {
            throw new RangeError(`Word ${wordIndex} is out of range (0..${index.words.length - 1})`);
        }
        return index.words[wordIndex].audioStart;
    }

    /**
     * Word whose original-document range contains `originalOffset`, or -1.
     * Used to turn a click in the document into a seek target.
     */
    public findWordAtOriginalOffset(index: WordIndex, originalOffset: number): number {
        const words = index.words;
        let low = 0;
        let high = words.length - 1;
        let result = -1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            if (words[mid].originalRange.start <= originalOffset) {
                result = mid;
                low = mid + 1;
            } else {
                high = mid - 1;
            }
        }

        if (result === -1) return -1;
        return originalOffset < words[result].originalRange.end ? result : -1;
    }

    /**
     * Calculates the progress (0.0 - 1.0) within the current word.
     * @param word The active word.
     * @param currentTimeMs Current playback time.
     */
    public calculateWordProgress(word: WordEntry, currentTimeMs: number): number {
        const duration = word.audioEnd - word.audioStart;
        if (duration <= 0) return 1;

        const elapsed = currentTimeMs - word.audioStart;
        return Math.min(1, Math.max(0, elapsed / duration));
    }
}
