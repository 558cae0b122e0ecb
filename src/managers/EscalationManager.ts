import { AlertEvent, DeliveryOutcome, EmergencyAlertResult, GeoLocation } from '../types/Alert';
import { CrisisContext } from '../types/Crisis';
import { EmergencyContactInput, EmergencyProfile, EmergencySetupStatus } from '../types/Emergency';
import { DeliveryMode } from '../config/Config';
import { NotFoundError, PreconditionFailedError, ValidationError } from '../models/errors';
import { maskPhone } from '../models/utils';
import { logger } from '../utils/logger';
import { EmergencyProfileManager } from './EmergencyProfileManager';
import { AlertComposer } from './AlertComposer';
import { AlertDispatcher } from './AlertDispatcher';

const log = logger.child('EscalationManager');

export interface TriggerAlertOptions {
    location?: GeoLocation | null;
    crisisContext?: CrisisContext;
    userName?: string;
}

export interface TestAlertOptions {
    userName?: string;
}

export const summarizeOutcomes = (outcomes: DeliveryOutcome[]): { sent: number; simulated: number; failed: number } => {
    return {
        sent: outcomes.filter(outcome => outcome.status === 'sent').length,
        simulated: outcomes.filter(outcome => outcome.status === 'simulated').length,
        failed: outcomes.filter(outcome => outcome.status === 'failed').length
    };
};

/**
 * Entry point for everything that reaches a user's emergency contacts:
 * contact setup, the setup check, real alerts and per-contact test alerts.
 */
export class EscalationManager {
    private profileManager: EmergencyProfileManager;
    private composer: AlertComposer;
    private dispatcher: AlertDispatcher;

    constructor(profileManager: EmergencyProfileManager, composer: AlertComposer, dispatcher: AlertDispatcher) {
        this.profileManager = profileManager;
        this.composer = composer;
        this.dispatcher = dispatcher;
    }

    saveEmergencyContacts(
        sessionId: string,
        contacts: EmergencyContactInput[],
        locationPermission: boolean
    ): EmergencyProfile {
        const profile = this.profileManager.saveContacts(sessionId, contacts, locationPermission);
        log.info('Emergency contacts saved', { sessionId, contactCount: profile.contacts.length });
        return profile;
    }

    getEmergencyContacts(sessionId: string): EmergencyProfile {
        return this.profileManager.getProfile(sessionId);
    }

    checkEmergencySetup(sessionId: string): EmergencySetupStatus {
        const contactCount = this.profileManager.getContactCount(sessionId);
        return {
            sessionId,
            setupCompleted: this.profileManager.hasProfile(sessionId) && contactCount > 0,
            contactCount
        };
    }

    deleteEmergencyContacts(sessionId: string): void {
        if (!this.profileManager.deleteProfile(sessionId)) {
            throw new NotFoundError('No emergency contacts found for this session');
        }
        log.info('Emergency contacts deleted', { sessionId });
    }

    async triggerEmergencyAlert(sessionId: string, options: TriggerAlertOptions = {}): Promise<EmergencyAlertResult> {
        const profile = this.requireProfile(sessionId);
        const payload = this.composer.compose(sessionId, options);
        const outcomes = await this.dispatcher.dispatch(payload, profile.contacts);

        const event: AlertEvent = {
            alertId: payload.alertId,
            sessionId,
            timestamp: payload.createdAt,
            location: payload.location,
            crisisContext: payload.crisisContext,
            isTest: false,
            outcomes
        };
        this.logAlertEvent(event);

        const counts = summarizeOutcomes(outcomes);
        const alertsSent = counts.sent + counts.simulated;
        const totalContacts = profile.contacts.length;

        let message: string;
        if (alertsSent === 0) {
            message = 'Failed to send emergency alerts to any contacts';
        } else if (counts.simulated > 0) {
            message = `Emergency alerts sent to ${alertsSent}/${totalContacts} contacts (${counts.simulated} simulated)`;
        } else {
            message = `Emergency alerts sent to ${alertsSent}/${totalContacts} contacts`;
        }

        return {
            success: alertsSent > 0,
            message,
            alertId: payload.alertId,
            alertsSent,
            simulatedCount: counts.simulated,
            totalContacts,
            deliveryStatus: outcomes,
            timestamp: event.timestamp
        };
    }

    /**
     * Send a test alert to the contact at `contactIndex` (zero-based) only.
     */
    async sendTestAlert(sessionId: string, contactIndex: number, options: TestAlertOptions = {}): Promise<DeliveryOutcome> {
        const profile = this.requireProfile(sessionId);
        const lastIndex = profile.contacts.length - 1;
        if (!Number.isInteger(contactIndex) || contactIndex < 0 || contactIndex > lastIndex) {
            throw new ValidationError(`Invalid contact index. Must be 0-${lastIndex}`);
        }

        const contact = profile.contacts[contactIndex];
        const payload = this.composer.composeTest(sessionId, options);
        const [outcome] = await this.dispatcher.dispatch(payload, [contact]);

        this.logAlertEvent({
            alertId: payload.alertId,
            sessionId,
            timestamp: payload.createdAt,
            location: payload.location,
            crisisContext: payload.crisisContext,
            isTest: true,
            outcomes: [outcome]
        });
        return outcome;
    }

    getDeliveryMode(): DeliveryMode {
        return this.dispatcher.getMode();
    }

    private requireProfile(sessionId: string): EmergencyProfile {
        if (!this.profileManager.hasProfile(sessionId)) {
            throw new PreconditionFailedError('No emergency contacts found. Please set up contacts first.');
        }
        return this.profileManager.getProfile(sessionId);
    }

    private logAlertEvent(event: AlertEvent): void {
        const counts = summarizeOutcomes(event.outcomes);
        log.info(event.isTest ? 'Test alert event' : 'Emergency alert event', {
            alertId: event.alertId,
            sessionId: event.sessionId,
            timestamp: event.timestamp.toISOString(),
            hasLocation: event.location !== null,
            indicators: event.crisisContext.crisisIndicators.length,
            ...counts,
            outcomes: event.outcomes.map(outcome => ({
                phone: maskPhone(outcome.phone),
                channel: outcome.channel,
                status: outcome.status,
                states: outcome.states.join('>')
            }))
        });
    }
}
