import type { TextNormalizer } from "../interfaces/TextNormalizer";
import type { NormalizedText } from "../models/SpeechData";
import { OffsetMapBuilder } from "../utils/OffsetMapBuilder";
import { assertWellFormed } from "../utils/TextEncoding";

/**
 * Reads the document as-is: no markup handling, only emoji removal and
 * whitespace collapsing. Used when the Markdown filter is switched off.
 */
export class PlainTextNormalizer implements TextNormalizer {
    public normalize(rawText: string): NormalizedText {
        assertWellFormed(rawText);

        const builder = new OffsetMapBuilder();
        builder.textWithoutEmoji(rawText, 0, rawText.length);
        const { spokenText, offsetMap } = builder.finish();

        return { originalText: rawText, spokenText, offsetMap };
    }
}
