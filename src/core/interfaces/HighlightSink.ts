import type { HighlightChange } from "../services/SyncEngine";

/**
 * Receives highlight changes, typically a text view.
 */
export interface HighlightSink {
    onHighlight(change: HighlightChange): void;
}
