import {
    AlertComposer,
    CLOSING_LINE,
    TEST_ALERT_HEADING,
    buildMapsLink,
    describeLocation,
    personalize
} from './AlertComposer';
import { SessionManager } from './SessionManager';
import { EmergencyProfileManager } from './EmergencyProfileManager';
import { CrisisDetector } from './CrisisDetector';
import { PreconditionFailedError, ValidationError } from '../models/errors';
import { formatHelplineBlock } from '../config/helplines';

describe('AlertComposer', () => {
    let sessionManager: SessionManager;
    let profiles: EmergencyProfileManager;
    let composer: AlertComposer;
    let sessionId: string;

    beforeEach(() => {
        sessionManager = new SessionManager('en');
        profiles = new EmergencyProfileManager();
        composer = new AlertComposer(sessionManager, profiles, new CrisisDetector(), { recentMessageCount: 5 });
        sessionId = sessionManager.createSession().sessionId;
        profiles.saveContacts(sessionId, [{ name: 'Asha', phone: '+919876543210', relationship: 'Family' }], true);
    });

    test('composes the full alert from recent conversation and location', () => {
        sessionManager.appendMessage(sessionId, 'user', 'I feel hopeless and want to die');
        sessionManager.appendMessage(sessionId, 'assistant', 'I am here with you.');
        sessionManager.setEmotion(sessionId, 'depressed');

        const payload = composer.compose(sessionId, {
            location: { latitude: 19.076, longitude: 72.8777, accuracy: 25.7 },
            userName: 'Priya'
        });

        expect(payload.alertId).toMatch(/^alert_/);
        expect(payload.isTest).toBe(false);
        expect(payload.userName).toBe('Priya');
        expect(payload.crisisContext).toEqual({
            crisisIndicators: ['want to die', 'hopeless'],
            detectedEmotion: 'depressed',
            recentConcerns: 'I feel hopeless and want to die'
        });
        expect(payload.mapsLink).toBe('https://maps.google.com/?q=19.076,72.8777');
        expect(payload.body).toBe([
            '🚨 URGENT: Priya needs help!',
            '',
            'Mental State: Depressed',
            'Concerns: want to die, hopeless',
            'Recent: I feel hopeless and want to die',
            '',
            '📍 Location:',
            'Lat: 19.076000, Lng: 72.877700 (±25m)',
            'https://maps.google.com/?q=19.076,72.8777',
            '',
            formatHelplineBlock(),
            '',
            CLOSING_LINE
        ].join('\n'));
    });

    test('falls back to a generic name and an unavailable location', () => {
        const payload = composer.compose(sessionId);

        expect(payload.location).toBeNull();
        expect(payload.mapsLink).toBeNull();
        expect(payload.locationText).toBe('Location unavailable');
        expect(payload.body.startsWith('🚨 URGENT: Your contact needs help!\n\n📍 Location:\nLocation unavailable\n\n🆘 Immediate Help:')).toBe(true);
    });

    test('test messages carry no conversation content', () => {
        sessionManager.appendMessage(sessionId, 'user', 'I want to die, my landlord Vikram keeps threatening me');
        sessionManager.setEmotion(sessionId, 'fearful');

        const payload = composer.composeTest(sessionId, { userName: 'Priya' });

        expect(payload.isTest).toBe(true);
        expect(payload.location).toBeNull();
        expect(payload.crisisContext).toEqual({ crisisIndicators: [] });
        expect(payload.body).toBe([
            TEST_ALERT_HEADING,
            '',
            'This is a test of the emergency contact system for Priya. ' +
                'If this were a real emergency, you would receive their location and crisis information.',
            '',
            'You are successfully set up as an emergency contact. ✅',
            '',
            'Crisis Helplines:',
            '• AASRA: 9820466726',
            '• Vandrevala: 1860-2662-345'
        ].join('\n'));
    });

    test('personalize greets the contact right after the test heading', () => {
        const text = personalize(composer.composeTest(sessionId), {
            name: 'Asha',
            phone: '+919876543210',
            relationship: 'Family',
            whatsappEnabled: true
        });

        expect(text.startsWith(`${TEST_ALERT_HEADING}\n\nHi Asha,\n\nThis is a test of the emergency contact system for Your contact.`))
            .toBe(true);
    });

    test('test messages also need an emergency profile', () => {
        const other = sessionManager.createSession().sessionId;
        expect(() => composer.composeTest(other)).toThrow(PreconditionFailedError);
    });

    test('uses an explicit crisis context, capping indicators and truncating concerns', () => {
        const payload = composer.compose(sessionId, {
            crisisContext: {
                detectedEmotion: 'deeply sad',
                crisisIndicators: ['one', 'two', 'three', 'four'],
                recentConcerns: 'x'.repeat(150)
            }
        });

        expect(payload.body).toContain('Mental State: Deeply Sad\nConcerns: one, two, three\n');
        expect(payload.body).toContain(`Recent: ${'x'.repeat(100)}...\n`);

        const emoji = composer.compose(sessionId, {
            crisisContext: { crisisIndicators: [], recentConcerns: `${'x'.repeat(99)}😢 and more` }
        });
        expect(emoji.body).toContain(`Recent: ${'x'.repeat(99)}😢...\n`);
    });

    test('summarises only the most recent messages', () => {
        composer = new AlertComposer(sessionManager, profiles, new CrisisDetector(), { recentMessageCount: 2 });
        sessionManager.appendMessage(sessionId, 'user', 'I want to die');
        sessionManager.appendMessage(sessionId, 'user', 'ok');
        sessionManager.appendMessage(sessionId, 'assistant', 'Thank you for telling me.');

        expect(composer.summarizeSession(sessionId)).toEqual({
            crisisIndicators: [],
            recentConcerns: 'ok'
        });
    });

    test('a neutral emotion is left out of the summary', () => {
        sessionManager.appendMessage(sessionId, 'user', 'hello');
        sessionManager.setEmotion(sessionId, 'neutral');

        expect(composer.summarizeSession(sessionId).detectedEmotion).toBeUndefined();
    });

    test('a cleared session yields an empty context', async () => {
        await sessionManager.clear(sessionId);

        const payload = composer.compose(sessionId);
        expect(payload.crisisContext).toEqual({ crisisIndicators: [] });
    });

    test('refuses to compose without an emergency profile', () => {
        const other = sessionManager.createSession().sessionId;
        expect(() => composer.compose(other)).toThrow(PreconditionFailedError);
    });

    test('rejects invalid coordinates', () => {
        expect(() => composer.compose(sessionId, { location: { latitude: 120, longitude: 0, accuracy: null } }))
            .toThrow(ValidationError);
    });

    test('personalize greets the contact ahead of the location', () => {
        const payload = composer.compose(sessionId);
        const text = personalize(payload, {
            name: 'Asha',
            phone: '+919876543210',
            relationship: 'Family',
            whatsappEnabled: true
        });

        expect(text).toContain('needs help!\n\nHi Asha,\n\n📍 Location:');
    });
});

describe('location helpers', () => {
    test('describeLocation prefers coordinates, then the address', () => {
        expect(describeLocation({ latitude: 12.5, longitude: -70.25, accuracy: null })).toBe('Lat: 12.500000, Lng: -70.250000');
        expect(describeLocation({ latitude: null, longitude: null, accuracy: null, address: ' MG Road ' })).toBe('MG Road');
        expect(describeLocation(null)).toBe('Location unavailable');
    });

    test('buildMapsLink needs both coordinates', () => {
        expect(buildMapsLink({ latitude: 0, longitude: 0, accuracy: null })).toBe('https://maps.google.com/?q=0,0');
        expect(buildMapsLink({ latitude: null, longitude: null, accuracy: null, address: 'MG Road' })).toBeNull();
    });
});
