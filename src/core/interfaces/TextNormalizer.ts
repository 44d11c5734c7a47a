import type { NormalizedText } from "../models/SpeechData";

/**
 * Interface for turning a loaded document into speakable text.
 * Design Pattern: Strategy Pattern.
 */
export interface TextNormalizer {
    /**
     * Strips formatting and records where every spoken character came from.
     * @param rawText The document content.
     * @throws NormalizationError when the text is not well-formed UTF-16.
     */
    normalize(rawText: string): NormalizedText;
}
