import { DeliveryOutcome, EmergencyAlertResult } from '../types/Alert';
import { EmergencyProfile, EmergencySetupStatus } from '../types/Emergency';
import { Message } from '../types/Message';
import { AppError } from '../models/errors';
import { maskPhone } from '../models/utils';
import { listSupportedLanguages } from '../config/languages';
import { CONTACT_LINE_FORMAT } from '../utils/contactParser';

export const HELP_TEXT = [
    'Commands:',
    '/start - Start a new conversation',
    '/language [code] - Show or change your language',
    '/setup_contacts - Register 1-3 emergency contacts',
    '/contacts - Show your emergency contacts',
    '/check_setup - Check whether emergency contacts are set up',
    '/alert [where you are] - Alert your emergency contacts now',
    '/test_alert <n> - Send a test alert to contact n',
    '/remove_contacts - Delete your emergency contacts',
    '/history - Show recent messages',
    '/clear - Start over with a fresh conversation',
    '/helplines - Crisis helplines',
    '',
    'Send a text or voice message to talk. Share your location before /alert to include it.'
].join('\n');

export const SETUP_CONTACTS_TEXT = [
    'Send /setup_contacts followed by one contact per line:',
    CONTACT_LINE_FORMAT,
    '',
    'Relationship is one of Family, Friend, Partner, Therapist, Other.',
    'Example:',
    '/setup_contacts',
    'Asha, +919876543210, Family',
    'Ravi, +919812345678, Friend, sms'
].join('\n');

const STATUS_ICONS: Record<DeliveryOutcome['status'], string> = {
    sent: '✅',
    simulated: '🧪',
    failed: '❌'
};

export const formatOutcome = (outcome: DeliveryOutcome): string => {
    const via = outcome.channel ? ` via ${outcome.channel}` : '';
    const detail = outcome.status === 'failed' && outcome.errorDetail ? ` (${outcome.errorDetail})` : '';
    return `${STATUS_ICONS[outcome.status]} ${outcome.contactName}: ${outcome.status}${via}${detail}`;
};

export const formatAlertResult = (result: EmergencyAlertResult): string => {
    return [result.message, ...result.deliveryStatus.map(formatOutcome)].join('\n');
};

export const formatProfile = (profile: EmergencyProfile): string => {
    const lines = profile.contacts.map((contact, index) => {
        const channel = contact.whatsappEnabled ? 'WhatsApp, SMS fallback' : 'SMS only';
        return `${index + 1}. ${contact.name} (${contact.relationship}) ${maskPhone(contact.phone)} - ${channel}`;
    });
    return ['Your emergency contacts:', ...lines].join('\n');
};

export const formatSetupStatus = (status: EmergencySetupStatus): string => {
    if (!status.setupCompleted) {
        return 'Emergency contacts are not set up yet. Use /setup_contacts to add them.';
    }
    return `Emergency contacts are set up (${status.contactCount} contact${status.contactCount === 1 ? '' : 's'}).`;
};

export const formatHistory = (messages: Message[]): string => {
    if (messages.length === 0) {
        return 'No messages in this conversation yet.';
    }
    return messages
        .map(message => `[${message.timestamp.toISOString()}] ${message.role === 'user' ? 'You' : 'Assistant'}: ${message.content}`)
        .join('\n');
};

export const formatLanguages = (current: string): string => {
    const lines = listSupportedLanguages().map(language => {
        const marker = language.code === current ? ' (current)' : '';
        return `${language.code} - ${language.name}${marker}`;
    });
    return ['Supported languages:', ...lines, '', 'Use /language <code> to change.'].join('\n');
};

/**
 * User-facing text for a domain error. Returns null for anything that is not
 * a domain error so the caller can fall back to a generic reply.
 */
export const describeErrorForUser = (error: unknown): string | null => {
    if (!(error instanceof AppError)) {
        return null;
    }
    switch (error.code) {
        case 'VALIDATION_ERROR':
            return error.message;
        case 'NOT_FOUND':
            return 'Nothing found for this conversation. Use /start to begin a new one.';
        case 'PRECONDITION_FAILED':
            return `${error.message}\n\n${SETUP_CONTACTS_TEXT}`;
        case 'TIMEOUT':
            return 'That took too long. Please try again.';
        case 'DELIVERY_FAILURE':
        case 'UPSTREAM_ERROR':
            return 'I could not process that right now. Please try again in a moment.';
    }
};
