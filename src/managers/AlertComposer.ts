import { AlertPayload, GeoLocation } from '../types/Alert';
import { CrisisContext } from '../types/Crisis';
import { EmergencyContact } from '../types/Emergency';
import { PreconditionFailedError } from '../models/errors';
import { capitalize, generateAlertId, truncate } from '../models/utils';
import { validateGeoLocation } from '../models/validation';
import { ALERT_HELPLINES, Helpline, formatHelplineBlock } from '../config/helplines';
import { SessionManager } from './SessionManager';
import { EmergencyProfileManager } from './EmergencyProfileManager';
import { CrisisDetector } from './CrisisDetector';

export const TEST_ALERT_HEADING = '🧪 TEST MESSAGE';
export const LOCATION_HEADING = '📍 Location:';
export const LOCATION_UNAVAILABLE = 'Location unavailable';
export const CLOSING_LINE = 'Please reach out to them immediately. They may need your support right now.';

const MAX_INDICATORS = 3;
const MAX_CONCERNS_LENGTH = 100;
const TEST_HELPLINE_COUNT = 2;

export interface ComposeOptions {
    location?: GeoLocation | null;
    crisisContext?: CrisisContext;
    userName?: string;
}

export interface TestComposeOptions {
    userName?: string;
}

export interface AlertComposerOptions {
    recentMessageCount?: number;
    helplines?: readonly Helpline[];
}

const hasCoordinates = (location: GeoLocation | null): location is GeoLocation & { latitude: number; longitude: number } => {
    return location !== null && location.latitude !== null && location.longitude !== null;
};

export const buildMapsLink = (location: GeoLocation | null): string | null => {
    if (!hasCoordinates(location)) {
        return null;
    }
    return `https://maps.google.com/?q=${location.latitude},${location.longitude}`;
};

export const describeLocation = (location: GeoLocation | null): string => {
    if (hasCoordinates(location)) {
        const accuracy = location.accuracy ? ` (±${Math.trunc(location.accuracy)}m)` : '';
        return `Lat: ${location.latitude.toFixed(6)}, Lng: ${location.longitude.toFixed(6)}${accuracy}`;
    }
    const address = location?.address?.trim();
    return address ? address : LOCATION_UNAVAILABLE;
};

const titleCase = (text: string): string => text.split(' ').map(capitalize).join(' ');

/**
 * Insert a greeting for one contact: after the heading of a test message,
 * ahead of the location block otherwise.
 */
export const personalize = (payload: AlertPayload, contact: EmergencyContact): string => {
    const greeting = `Hi ${contact.name},\n\n`;
    if (payload.isTest) {
        return payload.body.replace(`${TEST_ALERT_HEADING}\n\n`, `${TEST_ALERT_HEADING}\n\n${greeting}`);
    }
    return payload.body.replace(LOCATION_HEADING, `${greeting}${LOCATION_HEADING}`);
};

/**
 * Builds the alert text sent to emergency contacts from the session's recent
 * conversation, an optional location and the configured helplines.
 */
export class AlertComposer {
    private sessionManager: SessionManager;
    private profileManager: EmergencyProfileManager;
    private detector: CrisisDetector;
    private recentMessageCount: number;
    private helplines: readonly Helpline[];

    constructor(
        sessionManager: SessionManager,
        profileManager: EmergencyProfileManager,
        detector: CrisisDetector,
        options: AlertComposerOptions = {}
    ) {
        this.sessionManager = sessionManager;
        this.profileManager = profileManager;
        this.detector = detector;
        this.recentMessageCount = options.recentMessageCount ?? 5;
        this.helplines = options.helplines ?? ALERT_HELPLINES;
    }

    compose(sessionId: string, options: ComposeOptions = {}): AlertPayload {
        this.requireProfile(sessionId);

        const location = options.location ? validateGeoLocation(options.location) : null;
        const crisisContext = options.crisisContext ?? this.summarizeSession(sessionId);
        const userName = options.userName?.trim() || undefined;

        const locationText = describeLocation(location);
        const mapsLink = buildMapsLink(location);

        return {
            alertId: generateAlertId(),
            sessionId,
            createdAt: new Date(),
            location,
            locationText,
            mapsLink,
            crisisContext,
            ...(userName !== undefined ? { userName } : {}),
            isTest: false,
            body: this.renderBody(userName, crisisContext, locationText, mapsLink)
        };
    }

    /**
     * A test message confirming the contact is registered. Carries no
     * conversation content and no location.
     */
    composeTest(sessionId: string, options: TestComposeOptions = {}): AlertPayload {
        this.requireProfile(sessionId);

        const userName = options.userName?.trim() || undefined;
        const body = [
            TEST_ALERT_HEADING,
            '',
            `This is a test of the emergency contact system for ${userName ?? 'Your contact'}. ` +
                'If this were a real emergency, you would receive their location and crisis information.',
            '',
            'You are successfully set up as an emergency contact. ✅',
            '',
            formatHelplineBlock(this.helplines.slice(0, TEST_HELPLINE_COUNT), 'Crisis Helplines:')
        ].join('\n');

        return {
            alertId: generateAlertId(),
            sessionId,
            createdAt: new Date(),
            location: null,
            locationText: LOCATION_UNAVAILABLE,
            mapsLink: null,
            crisisContext: { crisisIndicators: [] },
            ...(userName !== undefined ? { userName } : {}),
            isTest: true,
            body
        };
    }

    /**
     * Derive a crisis context from the last few messages of a session. A
     * session that no longer exists yields an empty context.
     */
    summarizeSession(sessionId: string): CrisisContext {
        if (!this.sessionManager.hasSession(sessionId)) {
            return { crisisIndicators: [] };
        }

        const session = this.sessionManager.getSession(sessionId);
        const userText = this.sessionManager
            .getRecentMessages(sessionId, this.recentMessageCount)
            .filter(message => message.role === 'user')
            .map(message => message.content);

        const indicators: string[] = [];
        for (const text of userText) {
            const analysis = this.detector.analyze(text, session.language);
            for (const phrase of analysis.matchedPhrases) {
                if (!indicators.includes(phrase)) {
                    indicators.push(phrase);
                }
            }
        }

        const context: CrisisContext = {
            crisisIndicators: indicators.slice(0, MAX_INDICATORS)
        };
        if (session.lastEmotion !== null && session.lastEmotion !== 'neutral') {
            context.detectedEmotion = session.lastEmotion;
        }
        if (userText.length > 0) {
            context.recentConcerns = userText.join(' ');
        }
        return context;
    }

    private requireProfile(sessionId: string): void {
        if (!this.profileManager.hasProfile(sessionId)) {
            throw new PreconditionFailedError('Emergency contacts not set up for this session');
        }
    }

    private renderBody(
        userName: string | undefined,
        context: CrisisContext,
        locationText: string,
        mapsLink: string | null
    ): string {
        const lines: string[] = [`🚨 URGENT: ${userName ?? 'Your contact'} needs help!`, ''];

        const contextLines: string[] = [];
        if (context.detectedEmotion) {
            contextLines.push(`Mental State: ${titleCase(context.detectedEmotion)}`);
        }
        if (context.crisisIndicators.length > 0) {
            contextLines.push(`Concerns: ${context.crisisIndicators.slice(0, MAX_INDICATORS).join(', ')}`);
        }
        if (context.recentConcerns) {
            contextLines.push(`Recent: ${truncate(context.recentConcerns, MAX_CONCERNS_LENGTH)}`);
        }
        if (contextLines.length > 0) {
            lines.push(...contextLines, '');
        }

        lines.push(LOCATION_HEADING, locationText);
        if (mapsLink) {
            lines.push(mapsLink);
        }
        lines.push('', formatHelplineBlock(this.helplines), '', CLOSING_LINE);

        return lines.join('\n');
    }
}
