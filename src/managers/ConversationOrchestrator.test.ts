import fc from 'fast-check';
import { TURN_TRANSITIONS, TurnOptions, TurnStage } from './ConversationOrchestrator';
import { DeliveryFailure, UpstreamServiceError, UpstreamTimeoutError, ValidationError } from '../models/errors';
import { SUPPORT_SYSTEM_PROMPT, getCrisisResources } from '../config/prompts';
import { TestHarness, createTestHarness } from '../test-utils/fakes';

describe('ConversationOrchestrator', () => {
    let harness: TestHarness;
    let sessionId: string;

    const setup = (overrides: Record<string, string> = {}) => {
        harness = createTestHarness(overrides);
        sessionId = harness.context.sessionManager.createSession().sessionId;
    };

    const say = (text: string, options: TurnOptions = {}) => {
        return harness.context.orchestrator.submitUtterance(sessionId, { kind: 'text', text }, options);
    };

    beforeEach(() => setup());

    test('a crisis message sets the flag and replies with crisis resources', async () => {
        const result = await say('I want to hurt myself');

        expect(result.isCrisis).toBe(true);
        expect(result.crisisLevel).toBe('crisis');
        expect(result.replyText).toBe(`I hear you. Tell me more about what is going on.\n\n${getCrisisResources('en')}`);
        expect(result.stages).toEqual(['RECEIVED', 'TRANSCRIBED', 'CLASSIFIED', 'CRISIS_FLAGGED', 'RESPONDING', 'DELIVERED']);
        expect(harness.context.sessionManager.getSession(sessionId).crisisDetected).toBe(true);

        const [turns] = harness.services.completion.calls;
        expect(turns[0]).toEqual({ role: 'system', content: SUPPORT_SYSTEM_PROMPT });
        expect(turns[1].role).toBe('system');
        expect(turns[turns.length - 1]).toEqual({ role: 'user', content: 'I want to hurt myself' });
    });

    test('an ordinary message gets the model reply unchanged', async () => {
        const result = await say('I had a long day at work');

        expect(result.isCrisis).toBe(false);
        expect(result.crisisLevel).toBe('none');
        expect(result.replyText).toBe('I hear you. Tell me more about what is going on.');
        expect(result.replyAudio).toBeNull();
        expect(result.stages).toEqual(['RECEIVED', 'TRANSCRIBED', 'CLASSIFIED', 'RESPONDING', 'DELIVERED']);
        expect(harness.services.completion.calls[0]).toEqual([
            { role: 'system', content: SUPPORT_SYSTEM_PROMPT },
            { role: 'user', content: 'I had a long day at work' }
        ]);

        const history = harness.context.sessionManager.getHistory(sessionId);
        expect(history.map(message => [message.role, message.content])).toEqual([
            ['user', 'I had a long day at work'],
            ['assistant', 'I hear you. Tell me more about what is going on.']
        ]);
    });

    test('the crisis flag stays set on later calm turns', async () => {
        await say('I want to die');
        const result = await say('thanks, I feel a bit calmer');

        expect(result.isCrisis).toBe(false);
        expect(harness.context.sessionManager.getSession(sessionId).crisisDetected).toBe(true);
    });

    test('records the detected emotion on the session', async () => {
        const result = await say('I am so worried about my exams');

        expect(result.emotion).toBe('anxious');
        expect(harness.context.sessionManager.getSession(sessionId).lastEmotion).toBe('anxious');
    });

    test('sends only the configured history window to the model', async () => {
        setup({ HISTORY_WINDOW: '2' });
        harness.services.completion.reply = 'ok';

        await say('first message');
        await say('second message');
        await say('third message');

        expect(harness.services.completion.calls[2]).toEqual([
            { role: 'system', content: SUPPORT_SYSTEM_PROMPT },
            { role: 'user', content: 'second message' },
            { role: 'assistant', content: 'ok' },
            { role: 'user', content: 'third message' }
        ]);
    });

    test('a requested language is applied to the session and the prompt', async () => {
        const result = await say('namaste', { language: 'hi' });

        expect(result.language).toBe('hi');
        expect(harness.context.sessionManager.getSession(sessionId).language).toBe('hi');
        expect(harness.services.completion.calls[0][1]).toEqual({ role: 'system', content: 'Please respond in Hindi.' });
    });

    test('rejects unsupported languages and empty text before touching the session', async () => {
        await expect(say('hello', { language: 'xx' })).rejects.toThrow('Unsupported language: xx');
        await expect(say('   ')).rejects.toThrow(ValidationError);

        expect(harness.context.sessionManager.getHistory(sessionId)).toEqual([]);
        expect(harness.services.completion.calls).toHaveLength(0);
    });

    test('completion failures on a crisis turn fall back to static resources', async () => {
        harness.services.completion.failWith = new Error('rate limited');

        const result = await say('I want to end my life');

        expect(result.isCrisis).toBe(true);
        expect(result.replyText).toBe(getCrisisResources('en'));
    });

    test('completion failures on other turns surface as upstream errors', async () => {
        harness.services.completion.failWith = new Error('rate limited');

        await expect(say('hello')).rejects.toThrow(UpstreamServiceError);
        await expect(say('hello again')).rejects.toThrow('completion: rate limited');
    });

    test('an empty model reply counts as a failure', async () => {
        harness.services.completion.reply = '   ';

        await expect(say('hello')).rejects.toThrow('completion: empty reply');
    });

    test('a slow completion times out as an upstream error', async () => {
        setup({ COMPLETION_TIMEOUT_MS: '20' });
        harness.services.completion.delayMs = 500;

        const error = await say('hello').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(UpstreamTimeoutError);
        expect(error).not.toBeInstanceOf(DeliveryFailure);
        expect(error).toHaveProperty('code', 'TIMEOUT');
        expect(error).toHaveProperty('message', 'completion: timed out after 20ms');
    });

    test('a failed turn leaves history, language and emotion untouched', async () => {
        harness.services.completion.failWith = new Error('rate limited');

        await expect(say('I am so worried', { language: 'hi' })).rejects.toThrow(UpstreamServiceError);

        const session = harness.context.sessionManager.getSession(sessionId);
        expect(session.messages).toEqual([]);
        expect(session.language).toBe('en');
        expect(session.lastEmotion).toBeNull();

        harness.services.completion.failWith = null;
        await say('hello');
        expect(harness.services.completion.calls[1]).toEqual([
            { role: 'system', content: SUPPORT_SYSTEM_PROMPT },
            { role: 'user', content: 'hello' }
        ]);
    });

    test('clearing a session waits for the turn in progress', async () => {
        harness.services.completion.delayMs = 50;

        const turn = say('hello');
        await new Promise(resolve => setTimeout(resolve, 10));
        const cleared = harness.context.sessionManager.clear(sessionId);

        const result = await turn;
        await cleared;

        expect(result.replyText).toBe('I hear you. Tell me more about what is going on.');
        expect(harness.services.completion.calls).toHaveLength(1);
        expect(harness.context.sessionManager.hasSession(sessionId)).toBe(false);
    });

    describe('audio input', () => {
        const audio = Buffer.from('fake-ogg-bytes');

        test('transcribes, replies and speaks the reply', async () => {
            harness.services.transcription.text = '  I feel so hopeless  ';

            const result = await harness.context.orchestrator.submitUtterance(sessionId, {
                kind: 'audio',
                audio,
                filename: 'voice_1.ogg'
            });

            expect(result.transcription).toBe('I feel so hopeless');
            expect(result.crisisLevel).toBe('elevated');
            expect(result.replyAudioRef).toBe('audio_test_1');
            expect(result.replyAudio).toEqual(Buffer.from(`speech:${result.replyText}`));
            expect(result.stages).toEqual(['RECEIVED', 'TRANSCRIBED', 'CLASSIFIED', 'RESPONDING', 'SYNTHESIZED', 'DELIVERED']);

            expect(harness.services.transcription.requests[0].filename).toBe('voice_1.ogg');
            expect(harness.services.transcription.requests[0].language).toBe('en');

            const history = harness.context.sessionManager.getHistory(sessionId);
            expect(history[0].audioRef).toBe('voice_1.ogg');
            expect(history[1].audioRef).toBe('audio_test_1');
        });

        test('voice replies can be turned off', async () => {
            const result = await harness.context.orchestrator.submitUtterance(
                sessionId,
                { kind: 'audio', audio, filename: 'voice_1.ogg' },
                { voiceReply: false }
            );

            expect(result.replyAudio).toBeNull();
            expect(harness.services.synthesis.texts).toEqual([]);
        });

        test('a synthesis failure still returns the text reply', async () => {
            harness.services.synthesis.failWith = new Error('tts down');

            const result = await harness.context.orchestrator.submitUtterance(sessionId, {
                kind: 'audio',
                audio,
                filename: 'voice_1.ogg'
            });

            expect(result.replyText).toBe('I hear you. Tell me more about what is going on.');
            expect(result.replyAudio).toBeNull();
            expect(result.replyAudioRef).toBeNull();
            expect(result.stages).not.toContain('SYNTHESIZED');
        });

        test('rejects empty, oversized and silent audio', async () => {
            setup({ MAX_AUDIO_SIZE_MB: '1' });
            const submit = (data: Buffer) => harness.context.orchestrator.submitUtterance(sessionId, {
                kind: 'audio',
                audio: data,
                filename: 'voice.ogg'
            });

            await expect(submit(Buffer.alloc(0))).rejects.toThrow('Audio file is empty.');
            await expect(submit(Buffer.alloc(1024 * 1024 + 1))).rejects.toThrow('Audio file too large. Maximum size: 1MB');

            harness.services.transcription.text = '   ';
            await expect(submit(audio)).rejects.toThrow('No speech detected in audio.');
        });

        test('transcription failures surface as upstream errors', async () => {
            harness.services.transcription.failWith = new Error('bad audio');

            await expect(harness.context.orchestrator.submitUtterance(sessionId, {
                kind: 'audio',
                audio,
                filename: 'voice.ogg'
            })).rejects.toThrow('transcription: bad audio');
        });
    });

    test('turns on the same session run one after another', async () => {
        harness.services.completion.delayMs = 20;

        await Promise.all([say('first turn'), say('second turn')]);

        const secondCall = harness.services.completion.calls[1];
        expect(secondCall.map(turn => turn.content)).toEqual([
            SUPPORT_SYSTEM_PROMPT,
            'first turn',
            'I hear you. Tell me more about what is going on.',
            'second turn'
        ]);
    });

    test('unknown sessions are rejected', async () => {
        await expect(harness.context.orchestrator.submitUtterance('session_missing', { kind: 'text', text: 'hi' }))
            .rejects.toThrow('Session not found: session_missing');
    });

    /**
     * Property: every stage sequence produced by a turn follows the transition table
     */
    test('Property: stage sequences follow the transition table', async () => {
        await fc.assert(fc.asyncProperty(
            fc.constantFrom('hello', 'I want to die', 'I feel hopeless', 'what a great day'),
            fc.boolean(),
            async (text, voiceReply) => {
                const result = await say(text, { voiceReply });
                const stages: TurnStage[] = result.stages;

                expect(stages[0]).toBe('RECEIVED');
                expect(stages[stages.length - 1]).toBe('DELIVERED');
                for (let index = 1; index < stages.length; index++) {
                    expect(TURN_TRANSITIONS[stages[index - 1]]).toContain(stages[index]);
                }
            }
        ), { numRuns: 30 });
    });
});
