import { CrisisLevel, EmotionLabel } from '../types/Crisis';
import { Message } from '../types/Message';
import {
    ChatTurn,
    CompletionService,
    SpeechSynthesisService,
    SynthesizedAudio,
    TranscriptionService
} from '../types/Integrations';
import { TimeoutConfig } from '../config/Config';
import { isSupportedLanguage } from '../config/languages';
import {
    CRISIS_FRAMING_PROMPT,
    ELEVATED_FRAMING_PROMPT,
    SUPPORT_SYSTEM_PROMPT,
    getCrisisResources,
    languageInstruction
} from '../config/prompts';
import {
    AppError,
    TimeoutError,
    UpstreamServiceError,
    UpstreamTimeoutError,
    ValidationError,
    describeError
} from '../models/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../utils/logger';
import { SessionManager } from './SessionManager';
import { CrisisDetector } from './CrisisDetector';

const log = logger.child('ConversationOrchestrator');

export type TurnStage =
    | 'RECEIVED'
    | 'TRANSCRIBED'
    | 'CLASSIFIED'
    | 'CRISIS_FLAGGED'
    | 'RESPONDING'
    | 'SYNTHESIZED'
    | 'DELIVERED';

export const TURN_TRANSITIONS: Readonly<Record<TurnStage, readonly TurnStage[]>> = {
    RECEIVED: ['TRANSCRIBED'],
    TRANSCRIBED: ['CLASSIFIED'],
    CLASSIFIED: ['CRISIS_FLAGGED', 'RESPONDING'],
    CRISIS_FLAGGED: ['RESPONDING'],
    RESPONDING: ['SYNTHESIZED', 'DELIVERED'],
    SYNTHESIZED: ['DELIVERED'],
    DELIVERED: []
};

export type UtteranceInput =
    | { kind: 'text'; text: string }
    | { kind: 'audio'; audio: Buffer; filename: string };

export interface TurnOptions {
    language?: string;
    /** Defaults to true for audio input and false for text */
    voiceReply?: boolean;
}

export interface TurnResult {
    transcription: string;
    replyText: string;
    replyAudio: Buffer | null;
    replyAudioRef: string | null;
    isCrisis: boolean;
    crisisLevel: CrisisLevel;
    emotion: EmotionLabel;
    language: string;
    stages: TurnStage[];
}

export interface ConversationOrchestratorOptions {
    timeouts: Pick<TimeoutConfig, 'transcriptionMs' | 'completionMs' | 'synthesisMs'>;
    maxAudioSizeMb: number;
    historyWindow: number;
}

class TurnTracker {
    private current: TurnStage = 'RECEIVED';
    readonly visited: TurnStage[] = ['RECEIVED'];

    advance(next: TurnStage): void {
        if (!TURN_TRANSITIONS[this.current].includes(next)) {
            throw new Error(`Invalid turn transition: ${this.current} -> ${next}`);
        }
        this.current = next;
        this.visited.push(next);
    }
}

const toUpstreamError = (service: string, error: unknown): AppError => {
    if (error instanceof TimeoutError) {
        return new UpstreamTimeoutError(service, error.timeoutMs);
    }
    if (error instanceof AppError) {
        return error;
    }
    return new UpstreamServiceError(service, describeError(error));
};

/**
 * Runs one conversational turn: transcribe, classify, reply and optionally
 * speak the reply. Turns on the same session run one at a time.
 *
 * A crisis turn only sets the session's crisis flag. Alerting contacts is
 * left to an explicit escalation request.
 */
export class ConversationOrchestrator {
    private sessionManager: SessionManager;
    private detector: CrisisDetector;
    private transcription: TranscriptionService;
    private completion: CompletionService;
    private synthesis: SpeechSynthesisService | null;
    private options: ConversationOrchestratorOptions;

    constructor(
        sessionManager: SessionManager,
        detector: CrisisDetector,
        services: {
            transcription: TranscriptionService;
            completion: CompletionService;
            synthesis: SpeechSynthesisService | null;
        },
        options: ConversationOrchestratorOptions
    ) {
        this.sessionManager = sessionManager;
        this.detector = detector;
        this.transcription = services.transcription;
        this.completion = services.completion;
        this.synthesis = services.synthesis;
        this.options = options;
    }

    submitUtterance(sessionId: string, input: UtteranceInput, options: TurnOptions = {}): Promise<TurnResult> {
        return this.sessionManager.runExclusive(sessionId, () => this.runTurn(sessionId, input, options));
    }

    private async runTurn(sessionId: string, input: UtteranceInput, options: TurnOptions): Promise<TurnResult> {
        const session = this.sessionManager.getSession(sessionId);

        if (options.language !== undefined && !isSupportedLanguage(options.language)) {
            throw new ValidationError(`Unsupported language: ${options.language}`);
        }
        const language = options.language ?? session.language;

        const tracker = new TurnTracker();

        const text = await this.resolveText(input, language);
        tracker.advance('TRANSCRIBED');

        const analysis = this.detector.analyze(text, language);
        tracker.advance('CLASSIFIED');

        const isCrisis = analysis.level === 'crisis';
        if (isCrisis) {
            this.sessionManager.setCrisisFlag(sessionId, true);
            tracker.advance('CRISIS_FLAGGED');
            log.warn('Crisis indicators detected', {
                sessionId,
                language: analysis.patternLanguage,
                matched: analysis.matchedPhrases.length
            });
        }

        tracker.advance('RESPONDING');
        const history = this.sessionManager.getRecentMessages(sessionId, this.options.historyWindow);
        const replyText = await this.generateReply(history, text, analysis.level, language);

        // Only the crisis flag survives a failed turn; the rest is written once a reply exists
        if (language !== session.language) {
            this.sessionManager.setLanguage(sessionId, language);
        }
        this.sessionManager.appendMessage(sessionId, 'user', text, input.kind === 'audio' ? input.filename : undefined);
        this.sessionManager.setEmotion(sessionId, analysis.emotion);

        const wantsVoice = options.voiceReply ?? input.kind === 'audio';
        const audio = wantsVoice ? await this.synthesize(sessionId, replyText, language) : null;
        if (audio) {
            tracker.advance('SYNTHESIZED');
        }

        this.sessionManager.appendMessage(sessionId, 'assistant', replyText, audio ? audio.audioId : undefined);
        tracker.advance('DELIVERED');

        return {
            transcription: text,
            replyText,
            replyAudio: audio ? audio.data : null,
            replyAudioRef: audio ? audio.audioId : null,
            isCrisis,
            crisisLevel: analysis.level,
            emotion: analysis.emotion,
            language,
            stages: tracker.visited
        };
    }

    private async resolveText(input: UtteranceInput, language: string): Promise<string> {
        if (input.kind === 'text') {
            const text = input.text.trim();
            if (!text) {
                throw new ValidationError('Message content cannot be empty.');
            }
            return text;
        }

        const { audio, filename } = input;
        if (audio.length === 0) {
            throw new ValidationError('Audio file is empty.');
        }
        const maxBytes = this.options.maxAudioSizeMb * 1024 * 1024;
        if (audio.length > maxBytes) {
            throw new ValidationError(`Audio file too large. Maximum size: ${this.options.maxAudioSizeMb}MB`);
        }

        let text: string;
        try {
            const result = await withTimeout('transcription', this.options.timeouts.transcriptionMs, signal =>
                this.transcription.transcribe({ audio, filename, language, signal })
            );
            text = result.text.trim();
        } catch (error) {
            throw toUpstreamError('transcription', error);
        }

        if (!text) {
            throw new ValidationError('No speech detected in audio.');
        }
        return text;
    }

    private async generateReply(history: Message[], text: string, level: CrisisLevel, language: string): Promise<string> {
        const turns: ChatTurn[] = [{ role: 'system', content: SUPPORT_SYSTEM_PROMPT }];
        if (level === 'crisis') {
            turns.push({ role: 'system', content: CRISIS_FRAMING_PROMPT });
        } else if (level === 'elevated') {
            turns.push({ role: 'system', content: ELEVATED_FRAMING_PROMPT });
        }
        const instruction = languageInstruction(language);
        if (instruction) {
            turns.push({ role: 'system', content: instruction });
        }
        for (const message of history) {
            turns.push({ role: message.role, content: message.content });
        }
        turns.push({ role: 'user', content: text });

        let reply: string;
        try {
            reply = (await withTimeout('completion', this.options.timeouts.completionMs, signal =>
                this.completion.complete(turns, signal)
            )).trim();
            if (!reply) {
                throw new UpstreamServiceError('completion', 'empty reply');
            }
        } catch (error) {
            if (level !== 'crisis') {
                throw toUpstreamError('completion', error);
            }
            log.error('Completion failed on a crisis turn, using static crisis response', {
                error: describeError(error)
            });
            return getCrisisResources(language);
        }

        if (level === 'crisis') {
            return `${reply}\n\n${getCrisisResources(language)}`;
        }
        return reply;
    }

    private async synthesize(sessionId: string, text: string, language: string): Promise<SynthesizedAudio | null> {
        const synthesis = this.synthesis;
        if (!synthesis) {
            return null;
        }
        try {
            return await withTimeout('synthesis', this.options.timeouts.synthesisMs, signal =>
                synthesis.synthesize(text, language, signal)
            );
        } catch (error) {
            log.warn('Speech synthesis failed, replying with text only', {
                sessionId,
                error: describeError(error)
            });
            return null;
        }
    }
}
