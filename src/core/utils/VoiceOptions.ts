import type { VoiceInfo, VoiceLanguage } from "../interfaces/SynthesisBackend";

export const DEFAULT_VOICE_LANGUAGE = "en-US";

// Short voice names accepted in place of full neural voice ids
const VOICE_ALIASES = new Map<string, string>([
    ["alloy", "en-US-JennyNeural"],
    ["ash", "en-US-AndrewNeural"],
    ["ballad", "en-GB-ThomasNeural"],
    ["coral", "en-AU-NatashaNeural"],
    ["echo", "en-US-GuyNeural"],
    ["fable", "en-GB-SoniaNeural"],
    ["nova", "en-US-AriaNeural"],
    ["onyx", "en-US-EricNeural"],
    ["sage", "en-US-JennyNeural"],
    ["shimmer", "en-US-EmmaNeural"],
    ["verse", "en-US-BrianNeural"]
]);

export function listVoiceAliases(): string[] {
    return [...VOICE_ALIASES.keys()];
}

/**
 * Maps a short alias to its neural voice id; anything else is passed through.
 */
export function resolveVoice(voice: string): string {
    const name = voice.trim();
    return VOICE_ALIASES.get(name.toLowerCase()) ?? name;
}

/**
 * Converts a speed multiplier to the backend's signed percentage.
 * 1.25 -> "+25%", 0.5 -> "-50%".
 * @throws RangeError outside [0, 2].
 */
export function speedToRate(speed: number): string {
    if (!Number.isFinite(speed) || speed < 0 || speed > 2) {
        throw new RangeError(`Speed must be between 0 and 2, got ${speed}`);
    }
    const percent = Math.round((speed - 1) * 100);
    return percent < 0 ? `${percent}%` : `+${percent}%`;
}

/**
 * Keeps the voices whose locale starts with one of the requested prefixes.
 * No language means `DEFAULT_VOICE_LANGUAGE`; "all" keeps everything.
 */
export function filterVoices(voices: VoiceInfo[], language: VoiceLanguage = DEFAULT_VOICE_LANGUAGE): VoiceInfo[] {
    if (language === "all") return [...voices];
    const prefixes = typeof language === "string" ? [language] : language;
    return voices.filter(voice => prefixes.some(prefix => voice.language.startsWith(prefix)));
}
