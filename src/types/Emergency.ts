export const RELATIONSHIPS = ['Family', 'Friend', 'Partner', 'Therapist', 'Other'] as const;

export type Relationship = typeof RELATIONSHIPS[number];

export interface EmergencyContact {
    name: string;
    /** E.164 style: `+` followed by 10-15 digits */
    phone: string;
    relationship: Relationship;
    whatsappEnabled: boolean;
}

/**
 * Unvalidated contact as supplied by a caller. Phone numbers may still carry
 * separators and `whatsappEnabled` defaults to true.
 */
export interface EmergencyContactInput {
    name: string;
    phone: string;
    relationship: string;
    whatsappEnabled?: boolean;
}

export interface EmergencyProfile {
    sessionId: string;
    contacts: EmergencyContact[];
    locationPermission: boolean;
    setupCompleted: boolean;
    createdAt: Date;
    updatedAt: Date;
}

export interface EmergencySetupStatus {
    sessionId: string;
    setupCompleted: boolean;
    contactCount: number;
}
