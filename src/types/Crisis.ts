export type CrisisLevel = 'none' | 'elevated' | 'crisis';

export type EmotionLabel =
    | 'anxious'
    | 'sad'
    | 'angry'
    | 'stressed'
    | 'depressed'
    | 'fearful'
    | 'happy'
    | 'hopeful'
    | 'neutral';

export interface CrisisAnalysis {
    level: CrisisLevel;
    /** Normalised phrases that matched, crisis phrases first */
    matchedPhrases: string[];
    /** Language whose phrase table was applied (after fallback) */
    patternLanguage: string;
    emotion: EmotionLabel;
}

export interface CrisisContext {
    detectedEmotion?: string;
    crisisIndicators: string[];
    recentConcerns?: string;
    intensity?: number;
}
