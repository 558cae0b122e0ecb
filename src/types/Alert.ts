import { CrisisContext } from './Crisis';

export interface GeoLocation {
    latitude: number | null;
    longitude: number | null;
    /** Metres */
    accuracy: number | null;
    address?: string;
}

export interface AlertPayload {
    alertId: string;
    sessionId: string;
    createdAt: Date;
    location: GeoLocation | null;
    locationText: string;
    mapsLink: string | null;
    crisisContext: CrisisContext;
    userName?: string;
    isTest: boolean;
    body: string;
}

export type DeliveryChannelName = 'whatsapp' | 'sms';

export type DeliveryStatus = 'sent' | 'simulated' | 'failed';

export interface ChannelAttempt {
    channel: DeliveryChannelName;
    status: DeliveryStatus;
    providerMessageId?: string;
    errorDetail?: string;
}

export type DeliveryStateKind =
    | 'PENDING'
    | 'WHATSAPP_ATTEMPTED'
    | 'FAILED_WHATSAPP'
    | 'SMS_ATTEMPTED'
    | 'SENT'
    | 'SIMULATED'
    | 'FAILED';

export interface DeliveryOutcome {
    contactName: string;
    phone: string;
    channel: DeliveryChannelName | null;
    status: DeliveryStatus;
    errorDetail?: string;
    attempts: ChannelAttempt[];
    states: DeliveryStateKind[];
}

/** One escalation attempt. Logged once and then dropped. */
export interface AlertEvent {
    alertId: string;
    sessionId: string;
    timestamp: Date;
    location: GeoLocation | null;
    crisisContext: CrisisContext;
    isTest: boolean;
    outcomes: DeliveryOutcome[];
}

export interface EmergencyAlertResult {
    success: boolean;
    message: string;
    alertId: string;
    alertsSent: number;
    simulatedCount: number;
    totalContacts: number;
    deliveryStatus: DeliveryOutcome[];
    timestamp: Date;
}
