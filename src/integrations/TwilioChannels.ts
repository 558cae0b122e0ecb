import twilio from 'twilio';
import { DeliveryChannel, DeliveryReceipt } from '../types/Integrations';
import { TwilioConfig } from '../config/Config';

type TwilioClient = ReturnType<typeof twilio>;

const WHATSAPP_PREFIX = 'whatsapp:';

/**
 * Whether a separate SMS sender exists. A WhatsApp sender reused as the SMS
 * sender cannot deliver plain SMS.
 */
export const isSmsSenderUsable = (config: TwilioConfig): boolean => {
    const smsFrom = config.smsFrom;
    if (!smsFrom) {
        return false;
    }
    if (smsFrom.startsWith(WHATSAPP_PREFIX)) {
        return false;
    }
    return smsFrom !== config.whatsappFrom.slice(WHATSAPP_PREFIX.length);
};

export class WhatsAppChannel implements DeliveryChannel {
    readonly name = 'whatsapp';
    private client: TwilioClient;
    private from: string;

    constructor(client: TwilioClient, from: string) {
        this.client = client;
        this.from = from;
    }

    isAvailable(): boolean {
        return this.from.startsWith(WHATSAPP_PREFIX);
    }

    async send(to: string, body: string, signal?: AbortSignal): Promise<DeliveryReceipt> {
        // The Twilio client takes no abort signal; stop before the request is made
        signal?.throwIfAborted();
        const message = await this.client.messages.create({
            from: this.from,
            to: `${WHATSAPP_PREFIX}${to}`,
            body
        });
        return { providerMessageId: message.sid, providerStatus: message.status };
    }
}

export class SmsChannel implements DeliveryChannel {
    readonly name = 'sms';
    private client: TwilioClient;
    private config: TwilioConfig;

    constructor(client: TwilioClient, config: TwilioConfig) {
        this.client = client;
        this.config = config;
    }

    isAvailable(): boolean {
        return isSmsSenderUsable(this.config);
    }

    async send(to: string, body: string, signal?: AbortSignal): Promise<DeliveryReceipt> {
        const from = this.config.smsFrom;
        if (!from || !this.isAvailable()) {
            throw new Error('SMS phone number not configured');
        }
        signal?.throwIfAborted();
        const message = await this.client.messages.create({ from, to, body });
        return { providerMessageId: message.sid, providerStatus: message.status };
    }
}

export interface TwilioChannels {
    whatsapp: WhatsAppChannel | null;
    sms: SmsChannel | null;
}

/** Both channels are null when the account credentials are missing */
export const createTwilioChannels = (config: TwilioConfig): TwilioChannels => {
    if (!config.accountSid || !config.authToken) {
        return { whatsapp: null, sms: null };
    }

    const client = twilio(config.accountSid, config.authToken);
    return {
        whatsapp: new WhatsAppChannel(client, config.whatsappFrom),
        sms: new SmsChannel(client, config)
    };
};
