// Utility functions for ID generation and text handling
import { v4 as uuidv4 } from 'uuid';

export const generateSessionId = (): string => {
    return `session_${uuidv4()}`;
};

export const generateMessageId = (): string => {
    return `msg_${uuidv4()}`;
};

export const generateAlertId = (): string => {
    return `alert_${uuidv4()}`;
};

export const generateAudioId = (): string => {
    return `audio_${uuidv4()}`;
};

/** Cut to `maxLength` code points so surrogate pairs stay whole */
export const truncate = (text: string, maxLength: number): string => {
    const codePoints = Array.from(text);
    if (codePoints.length <= maxLength) {
        return text;
    }
    return `${codePoints.slice(0, maxLength).join('')}...`;
};

/** Mask all but the last four digits of a phone number for logging */
export const maskPhone = (phone: string): string => {
    if (phone.length <= 4) {
        return phone;
    }
    return `${'*'.repeat(phone.length - 4)}${phone.slice(-4)}`;
};

export const capitalize = (text: string): string => {
    if (!text) {
        return text;
    }
    return text.charAt(0).toUpperCase() + text.slice(1);
};
