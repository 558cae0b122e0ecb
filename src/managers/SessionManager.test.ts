import fc from 'fast-check';
import { SessionManager } from './SessionManager';
import { NotFoundError, ValidationError } from '../models/errors';

describe('SessionManager', () => {
    let sessionManager: SessionManager;

    beforeEach(() => {
        sessionManager = new SessionManager('en');
    });

    test('creates sessions with the default language and no crisis flag', () => {
        const session = sessionManager.createSession();

        expect(session.sessionId).toMatch(/^session_[0-9a-f-]{36}$/);
        expect(session.language).toBe('en');
        expect(session.messages).toEqual([]);
        expect(session.crisisDetected).toBe(false);
        expect(session.lastEmotion).toBeNull();
        expect(sessionManager.hasSession(session.sessionId)).toBe(true);
    });

    test('appends trimmed messages in order', () => {
        const { sessionId } = sessionManager.createSession('hi');

        sessionManager.appendMessage(sessionId, 'user', '  hello  ');
        sessionManager.appendMessage(sessionId, 'assistant', 'hi there', 'audio_1');

        const history = sessionManager.getHistory(sessionId);
        expect(history.map(message => [message.role, message.content])).toEqual([
            ['user', 'hello'],
            ['assistant', 'hi there']
        ]);
        expect(history[1].audioRef).toBe('audio_1');
        expect(history[0].audioRef).toBeUndefined();
    });

    test('stored messages are frozen and snapshots are detached', () => {
        const { sessionId } = sessionManager.createSession();
        const message = sessionManager.appendMessage(sessionId, 'user', 'hello');

        expect(Object.isFrozen(message)).toBe(true);

        const snapshot = sessionManager.getSession(sessionId);
        snapshot.messages.push(message);
        expect(sessionManager.getHistory(sessionId)).toHaveLength(1);
    });

    test('rejects empty messages', () => {
        const { sessionId } = sessionManager.createSession();
        expect(() => sessionManager.appendMessage(sessionId, 'user', '   ')).toThrow(ValidationError);
    });

    test('returns the most recent messages', () => {
        const { sessionId } = sessionManager.createSession();
        ['one', 'two', 'three'].forEach(text => sessionManager.appendMessage(sessionId, 'user', text));

        expect(sessionManager.getRecentMessages(sessionId, 2).map(message => message.content)).toEqual(['two', 'three']);
        expect(sessionManager.getRecentMessages(sessionId, 0)).toEqual([]);
    });

    test('updates crisis flag, language and emotion', () => {
        const { sessionId } = sessionManager.createSession();

        sessionManager.setCrisisFlag(sessionId, true);
        sessionManager.setLanguage(sessionId, 'es');
        sessionManager.setEmotion(sessionId, 'anxious');

        const session = sessionManager.getSession(sessionId);
        expect(session.crisisDetected).toBe(true);
        expect(session.language).toBe('es');
        expect(session.lastEmotion).toBe('anxious');
    });

    test('clear discards the session', async () => {
        const { sessionId } = sessionManager.createSession();
        await sessionManager.clear(sessionId);

        expect(sessionManager.hasSession(sessionId)).toBe(false);
        expect(() => sessionManager.getSession(sessionId)).toThrow(NotFoundError);
        await expect(sessionManager.clear(sessionId)).rejects.toThrow(`Session not found: ${sessionId}`);
    });

    test('clear runs after exclusive work already queued on the session', async () => {
        const { sessionId } = sessionManager.createSession();
        let sawSession = false;

        const work = sessionManager.runExclusive(sessionId, async () => {
            await new Promise(resolve => setTimeout(resolve, 20));
            sawSession = sessionManager.hasSession(sessionId);
        });
        const cleared = sessionManager.clear(sessionId);

        await Promise.all([work, cleared]);
        expect(sawSession).toBe(true);
        expect(sessionManager.hasSession(sessionId)).toBe(false);
    });

    test('unknown sessions raise NotFoundError', () => {
        expect(() => sessionManager.appendMessage('session_missing', 'user', 'hi')).toThrow(NotFoundError);
        expect(() => sessionManager.getHistory('session_missing')).toThrow(NotFoundError);
        expect(() => sessionManager.setCrisisFlag('session_missing', true)).toThrow(NotFoundError);
    });

    /**
     * Property: history preserves append order for any sequence of messages
     */
    test('Property: history preserves append order', () => {
        fc.assert(fc.property(
            fc.array(fc.string({ minLength: 1 }).filter(text => text.trim().length > 0), { maxLength: 20 }),
            texts => {
                const { sessionId } = sessionManager.createSession();
                texts.forEach(text => sessionManager.appendMessage(sessionId, 'user', text));
                expect(sessionManager.getHistory(sessionId).map(message => message.content))
                    .toEqual(texts.map(text => text.trim()));
            }
        ));
    });

    test('runExclusive serialises work per session', async () => {
        const { sessionId } = sessionManager.createSession();
        const order: number[] = [];

        await Promise.all([1, 2, 3].map(index => sessionManager.runExclusive(sessionId, async () => {
            await new Promise(resolve => setTimeout(resolve, 5 * (4 - index)));
            order.push(index);
        })));

        expect(order).toEqual([1, 2, 3]);
    });
});
