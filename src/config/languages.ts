export interface LanguageInfo {
    code: string;
    name: string;
}

export const SUPPORTED_LANGUAGES: Record<string, LanguageInfo> = {
    en: { code: 'en', name: 'English' },
    hi: { code: 'hi', name: 'Hindi' },
    es: { code: 'es', name: 'Spanish' },
    fr: { code: 'fr', name: 'French' },
    de: { code: 'de', name: 'German' },
    pt: { code: 'pt', name: 'Portuguese' },
    it: { code: 'it', name: 'Italian' },
    ja: { code: 'ja', name: 'Japanese' },
    ko: { code: 'ko', name: 'Korean' },
    zh: { code: 'zh', name: 'Chinese' }
};

export const BASE_LANGUAGE = 'en';

export const isSupportedLanguage = (code: string): boolean => {
    return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, code);
};

export const getLanguageName = (code: string): string => {
    return isSupportedLanguage(code) ? SUPPORTED_LANGUAGES[code].name : code;
};

export const listSupportedLanguages = (): LanguageInfo[] => Object.values(SUPPORTED_LANGUAGES);
