// Core
export { DEFAULT_CONFIG, loadConfig } from './core/config/SpeechConfig';
export type { SpeechConfig } from './core/config/SpeechConfig';
export {
    SpeechError,
    NormalizationError,
    SynthesisError,
    AlignmentError,
    NotReadyError,
    ConfigError
} from './core/errors/SpeechErrors';
export type { SpeechErrorCode } from './core/errors/SpeechErrors';

export type {
    OffsetRange,
    OffsetMap,
    TextRange,
    NormalizedText,
    Segment,
    BoundaryHint,
    Anchor,
    SegmentTiming,
    SegmentOutcome
} from './core/models/SpeechData';
export type { WordEntry, WordIndex, PlaybackState } from './core/models/WordTimeline';

export type { TextNormalizer } from './core/interfaces/TextNormalizer';
export type { SynthesisBackend, SynthesisRequest, SynthesisResult, SynthesisBoundary, VoiceInfo, VoiceLanguage } from './core/interfaces/SynthesisBackend';
export type { AudioPlayer } from './core/interfaces/AudioPlayer';
export type { HighlightSink } from './core/interfaces/HighlightSink';

export { MarkdownNormalizer } from './core/parsers/MarkdownNormalizer';
export type { MarkdownNormalizerOptions } from './core/parsers/MarkdownNormalizer';
export { PlainTextNormalizer } from './core/parsers/PlainTextNormalizer';

export { HttpSynthesisProvider } from './core/providers/HttpSynthesisProvider';
export type { HttpSynthesisOptions } from './core/providers/HttpSynthesisProvider';
export { MockSynthesisProvider } from './core/providers/MockSynthesisProvider';
export type { MockSynthesisOptions } from './core/providers/MockSynthesisProvider';
export { MockAudioPlayer } from './core/providers/MockAudioPlayer';

export { SegmentSplitter } from './core/services/SegmentSplitter';
export { BoundaryCollector } from './core/services/BoundaryCollector';
export type { CollectedTimeline } from './core/services/BoundaryCollector';
export { WordIndexBuilder } from './core/services/WordIndexBuilder';
export type { WordIndexInput } from './core/services/WordIndexBuilder';
export { PlaybackSynchronizer } from './core/services/PlaybackSynchronizer';
export { SyncEngine } from './core/services/SyncEngine';
export type { SyncState, SyncSnapshot, HighlightChange, HighlightListener, SyncEngineOptions } from './core/services/SyncEngine';
export { SpeechGenerator } from './core/services/SpeechGenerator';
export type { GenerateOptions, GenerationProgress, GenerationResult, SpeechGeneratorDeps } from './core/services/SpeechGenerator';
export { SpeechSession } from './core/services/SpeechSession';
export type { SpeechSessionOptions } from './core/services/SpeechSession';
export { AudioMetadataService } from './core/services/AudioMetadataService';
export { AudioExporter } from './core/services/AudioExporter';
export type { ConcatenatedAudio, TimingsDocument } from './core/services/AudioExporter';
export { CaptionService } from './core/services/CaptionService';
export type { CaptionCue } from './core/services/CaptionService';

export { Logger } from './core/utils/Logger';
export type { LogLevel, LogEntry } from './core/utils/Logger';
export { OffsetMapBuilder } from './core/utils/OffsetMapBuilder';
export { toOriginalOffset, toOriginalRange, verifyOffsetMap } from './core/utils/OffsetMapper';
export { decodeDocument } from './core/utils/TextEncoding';
export { tokenizeWords } from './core/utils/TextPatterns';
export type { WordToken } from './core/utils/TextPatterns';
export { DEFAULT_VOICE_LANGUAGE, filterVoices, listVoiceAliases, resolveVoice, speedToRate } from './core/utils/VoiceOptions';

// UI
export { default as App, createBrowserSession } from './ui/App';
export { HtmlAudioPlayer } from './ui/adapters/HtmlAudioPlayer';
export type { MediaElementLike, ObjectUrlFactory } from './ui/adapters/HtmlAudioPlayer';
export { useActiveWord } from './ui/hooks/useActiveWord';
export { HighlightedText, splitIntoPieces } from './ui/components/HighlightedText';
export type { TextPiece } from './ui/components/HighlightedText';
export { ReaderView } from './ui/components/ReaderView';
export { LogPane } from './ui/components/LogPane';
