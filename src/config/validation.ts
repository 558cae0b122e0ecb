import type { AppConfig } from './Config';
import { isSupportedLanguage } from './languages';
import { SPEECH_VOICES, isSpeechVoice } from '../integrations/speechVoices';

export function validateConfig(config: AppConfig): void {
    // Telegram bot tokens look like 123456789:AAH...
    if (!config.botToken.match(/^\d+:[A-Za-z0-9_-]{35}$/)) {
        throw new Error('Invalid BOT_TOKEN format. Expected format: 123456789:ABCdefGHIjklMNOpqrSTUvwxYZ123456789');
    }

    if (!isSupportedLanguage(config.defaultLanguage)) {
        throw new Error(`DEFAULT_LANGUAGE is not supported: ${config.defaultLanguage}`);
    }

    if (!isSpeechVoice(config.llm.speechVoice)) {
        throw new Error(`LLM_SPEECH_VOICE must be one of: ${SPEECH_VOICES.join(', ')}`);
    }

    const timeouts: Array<[string, number]> = [
        ['TRANSCRIPTION_TIMEOUT_MS', config.timeouts.transcriptionMs],
        ['COMPLETION_TIMEOUT_MS', config.timeouts.completionMs],
        ['SYNTHESIS_TIMEOUT_MS', config.timeouts.synthesisMs],
        ['DELIVERY_TIMEOUT_MS', config.timeouts.deliveryMs]
    ];
    for (const [name, value] of timeouts) {
        if (value < 1) {
            throw new Error(`${name} must be at least 1`);
        }
    }

    if (config.maxAudioSizeMb < 1) {
        throw new Error('MAX_AUDIO_SIZE_MB must be at least 1');
    }

    if (config.recentMessageCount < 1) {
        throw new Error('RECENT_MESSAGE_COUNT must be at least 1');
    }

    if (config.historyWindow < 0) {
        throw new Error('HISTORY_WINDOW must not be negative');
    }

    if (config.deliveryMode === 'live' && (!config.twilio.accountSid || !config.twilio.authToken)) {
        throw new Error('DELIVERY_MODE=live requires TWILIO_ACCOUNT_SID and TWILIO_AUTH_TOKEN');
    }

    if (!config.twilio.whatsappFrom.startsWith('whatsapp:')) {
        throw new Error('TWILIO_WHATSAPP_NUMBER must start with whatsapp:');
    }
}
