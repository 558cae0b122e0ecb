import dotenv from 'dotenv';
import { LogLevel, isLogLevel } from '../utils/logger';
import { BASE_LANGUAGE } from './languages';
import { validateConfig } from './validation';

// Load environment variables
dotenv.config();

export type DeliveryMode = 'live' | 'simulated';

export interface LlmConfig {
    apiKey?: string;
    baseUrl?: string;
    completionModel: string;
    transcriptionModel: string;
    speechModel: string;
    speechVoice: string;
}

export interface TwilioConfig {
    accountSid?: string;
    authToken?: string;
    whatsappFrom: string;
    smsFrom?: string;
}

export interface TimeoutConfig {
    transcriptionMs: number;
    completionMs: number;
    synthesisMs: number;
    deliveryMs: number;
}

export interface AppConfig {
    botToken: string;
    nodeEnv: string;
    logLevel: LogLevel;
    defaultLanguage: string;
    llm: LlmConfig;
    twilio: TwilioConfig;
    /** `simulated` never calls the messaging provider */
    deliveryMode: DeliveryMode;
    timeouts: TimeoutConfig;
    maxAudioSizeMb: number;
    recentMessageCount: number;
    historyWindow: number;
}

export type EnvSource = Record<string, string | undefined>;

export const TWILIO_SANDBOX_WHATSAPP = 'whatsapp:+14155238886';

const readInt = (env: EnvSource, key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new Error(`${key} must be an integer`);
    }
    return value;
};

const readOptional = (env: EnvSource, key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
};

const resolveDeliveryMode = (env: EnvSource, twilio: TwilioConfig): DeliveryMode => {
    const requested = readOptional(env, 'DELIVERY_MODE');
    if (requested === 'live' || requested === 'simulated') {
        return requested;
    }
    if (requested !== undefined) {
        throw new Error('DELIVERY_MODE must be one of: live, simulated');
    }
    return twilio.accountSid && twilio.authToken ? 'live' : 'simulated';
};

/**
 * Build a validated config from an environment map. Kept separate from the
 * singleton so tests can feed their own environment.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
    const botToken = readOptional(env, 'BOT_TOKEN');
    if (!botToken) {
        throw new Error('Required environment variable BOT_TOKEN is not set');
    }

    const rawLogLevel = readOptional(env, 'LOG_LEVEL') ?? 'info';
    if (!isLogLevel(rawLogLevel)) {
        throw new Error('LOG_LEVEL must be one of: error, warn, info, debug');
    }

    const twilio: TwilioConfig = {
        accountSid: readOptional(env, 'TWILIO_ACCOUNT_SID'),
        authToken: readOptional(env, 'TWILIO_AUTH_TOKEN'),
        whatsappFrom: readOptional(env, 'TWILIO_WHATSAPP_NUMBER') ?? TWILIO_SANDBOX_WHATSAPP,
        smsFrom: readOptional(env, 'TWILIO_PHONE_NUMBER')
    };

    const config: AppConfig = {
        botToken,
        nodeEnv: readOptional(env, 'NODE_ENV') ?? 'development',
        logLevel: rawLogLevel,
        defaultLanguage: readOptional(env, 'DEFAULT_LANGUAGE') ?? BASE_LANGUAGE,
        llm: {
            apiKey: readOptional(env, 'LLM_API_KEY'),
            baseUrl: readOptional(env, 'LLM_BASE_URL'),
            completionModel: readOptional(env, 'LLM_COMPLETION_MODEL') ?? 'gpt-4o-mini',
            transcriptionModel: readOptional(env, 'LLM_TRANSCRIPTION_MODEL') ?? 'whisper-1',
            speechModel: readOptional(env, 'LLM_SPEECH_MODEL') ?? 'tts-1',
            speechVoice: readOptional(env, 'LLM_SPEECH_VOICE') ?? 'nova'
        },
        twilio,
        deliveryMode: resolveDeliveryMode(env, twilio),
        timeouts: {
            transcriptionMs: readInt(env, 'TRANSCRIPTION_TIMEOUT_MS', 30000),
            completionMs: readInt(env, 'COMPLETION_TIMEOUT_MS', 30000),
            synthesisMs: readInt(env, 'SYNTHESIS_TIMEOUT_MS', 45000),
            deliveryMs: readInt(env, 'DELIVERY_TIMEOUT_MS', 10000)
        },
        maxAudioSizeMb: readInt(env, 'MAX_AUDIO_SIZE_MB', 25),
        recentMessageCount: readInt(env, 'RECENT_MESSAGE_COUNT', 5),
        historyWindow: readInt(env, 'HISTORY_WINDOW', 10)
    };

    validateConfig(config);
    return config;
}

export class Config {
    private static instance: AppConfig | undefined;

    public static getInstance(): AppConfig {
        if (!Config.instance) {
            Config.instance = loadConfig();
        }
        return Config.instance;
    }
}

// Re-export validateConfig for convenience
export { validateConfig };
