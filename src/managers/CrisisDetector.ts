import patternData from '../data/crisis-patterns.json';
import { CrisisAnalysis, CrisisLevel, EmotionLabel } from '../types/Crisis';

export interface LanguagePatterns {
    crisis: string[];
    elevated: string[];
}

export interface CrisisPatternTable {
    defaultLanguage: string;
    languages: Record<string, LanguagePatterns>;
    emotions: Record<string, Record<string, string[]>>;
}

const EMOTION_LABELS: readonly EmotionLabel[] = [
    'anxious', 'sad', 'angry', 'stressed', 'depressed', 'fearful', 'happy', 'hopeful', 'neutral'
];

const isEmotionLabel = (value: string): value is EmotionLabel => {
    return EMOTION_LABELS.some(label => label === value);
};

/**
 * Lower-cases, NFC-normalises, straightens apostrophes and collapses
 * whitespace so table phrases and utterances compare on equal terms.
 */
export const normalizeUtterance = (text: string): string => {
    return text
        .normalize('NFC')
        .toLowerCase()
        .replace(/[‘’ʼ`´]/g, '\'')
        .replace(/\s+/g, ' ')
        .trim();
};

interface CompiledLanguage {
    crisis: string[];
    elevated: string[];
}

type CompiledEmotions = Array<[EmotionLabel, string[]]>;

/**
 * Keyword classifier over a declarative per-language phrase table.
 *
 * The table for the requested language is checked together with the default
 * language's table; an unregistered language uses the default table alone.
 * Output depends on nothing but the text and the language code.
 */
export class CrisisDetector {
    private defaultLanguage: string;
    private languages: Map<string, CompiledLanguage> = new Map();
    private emotions: Map<string, CompiledEmotions> = new Map();

    constructor(table: CrisisPatternTable = patternData) {
        if (!table.languages[table.defaultLanguage]) {
            throw new Error(`Crisis pattern table has no entry for default language ${table.defaultLanguage}`);
        }

        this.defaultLanguage = table.defaultLanguage;

        for (const [code, patterns] of Object.entries(table.languages)) {
            this.languages.set(code, {
                crisis: this.compilePhrases(patterns.crisis),
                elevated: this.compilePhrases(patterns.elevated)
            });
        }

        for (const [code, labels] of Object.entries(table.emotions)) {
            const compiled: CompiledEmotions = [];
            for (const [label, phrases] of Object.entries(labels)) {
                if (!isEmotionLabel(label)) {
                    throw new Error(`Unknown emotion label in pattern table: ${label}`);
                }
                compiled.push([label, this.compilePhrases(phrases)]);
            }
            this.emotions.set(code, compiled);
        }
    }

    classify(text: string, language: string): CrisisLevel {
        return this.analyze(text, language).level;
    }

    analyze(text: string, language: string): CrisisAnalysis {
        const normalized = normalizeUtterance(text);
        const patternLanguage = this.resolveLanguage(language);
        const tables = this.tablesFor(patternLanguage);

        const crisisMatches = this.matchAll(normalized, tables.map(table => table.crisis));
        const elevatedMatches = this.matchAll(normalized, tables.map(table => table.elevated));

        let level: CrisisLevel = 'none';
        if (crisisMatches.length > 0) {
            level = 'crisis';
        } else if (elevatedMatches.length > 0) {
            level = 'elevated';
        }

        return {
            level,
            matchedPhrases: [...crisisMatches, ...elevatedMatches],
            patternLanguage,
            emotion: this.detectEmotion(normalized, patternLanguage)
        };
    }

    hasLanguage(language: string): boolean {
        return this.languages.has(language);
    }

    getRegisteredLanguages(): string[] {
        return [...this.languages.keys()];
    }

    getPhrases(language: string, severity: 'crisis' | 'elevated'): string[] {
        const table = this.languages.get(language);
        return table ? [...table[severity]] : [];
    }

    private resolveLanguage(language: string): string {
        return this.languages.has(language) ? language : this.defaultLanguage;
    }

    private tablesFor(language: string): CompiledLanguage[] {
        const tables: CompiledLanguage[] = [];
        const primary = this.languages.get(language);
        if (primary) {
            tables.push(primary);
        }
        const fallback = this.languages.get(this.defaultLanguage);
        if (fallback && language !== this.defaultLanguage) {
            tables.push(fallback);
        }
        return tables;
    }

    private matchAll(normalized: string, phraseLists: string[][]): string[] {
        const matches: string[] = [];
        for (const phrases of phraseLists) {
            for (const phrase of phrases) {
                if (normalized.includes(phrase) && !matches.includes(phrase)) {
                    matches.push(phrase);
                }
            }
        }
        return matches;
    }

    private detectEmotion(normalized: string, language: string): EmotionLabel {
        const candidates = [this.emotions.get(language), this.emotions.get(this.defaultLanguage)];
        for (const table of candidates) {
            if (!table) continue;
            for (const [label, phrases] of table) {
                if (phrases.some(phrase => normalized.includes(phrase))) {
                    return label;
                }
            }
        }
        return 'neutral';
    }

    private compilePhrases(phrases: string[]): string[] {
        return phrases.map(normalizeUtterance).filter(phrase => phrase.length > 0);
    }
}
