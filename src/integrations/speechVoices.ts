export const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type SpeechVoice = typeof SPEECH_VOICES[number];

export const isSpeechVoice = (value: string): value is SpeechVoice => {
    return SPEECH_VOICES.some(voice => voice === value);
};
