import { Session } from '../types/Session';
import { Message, MessageRole } from '../types/Message';
import { EmotionLabel } from '../types/Crisis';
import { NotFoundError, ValidationError } from '../models/errors';
import { generateMessageId, generateSessionId } from '../models/utils';
import { KeyedMutex } from '../utils/KeyedMutex';
import { BASE_LANGUAGE } from '../config/languages';

/**
 * In-memory conversation store. Sessions live for the lifetime of the process
 * and are discarded on `clear`.
 */
export class SessionManager {
    private sessions: Map<string, Session> = new Map();
    private locks: KeyedMutex = new KeyedMutex();
    private defaultLanguage: string;

    constructor(defaultLanguage: string = BASE_LANGUAGE) {
        this.defaultLanguage = defaultLanguage;
    }

    createSession(language?: string): Session {
        const now = new Date();
        const session: Session = {
            sessionId: generateSessionId(),
            language: language ?? this.defaultLanguage,
            messages: [],
            crisisDetected: false,
            lastEmotion: null,
            createdAt: now,
            updatedAt: now
        };

        this.sessions.set(session.sessionId, session);
        return this.snapshot(session);
    }

    hasSession(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    getSession(sessionId: string): Session {
        return this.snapshot(this.require(sessionId));
    }

    /**
     * Append a message to the end of the history. The stored message is frozen.
     */
    appendMessage(sessionId: string, role: MessageRole, content: string, audioRef?: string): Message {
        const session = this.require(sessionId);

        const trimmed = content.trim();
        if (!trimmed) {
            throw new ValidationError('Message content cannot be empty.');
        }

        const message: Message = Object.freeze({
            messageId: generateMessageId(),
            sessionId,
            role,
            content: trimmed,
            timestamp: new Date(),
            ...(audioRef !== undefined ? { audioRef } : {})
        });

        session.messages.push(message);
        session.updatedAt = message.timestamp;
        return message;
    }

    getHistory(sessionId: string): Message[] {
        return [...this.require(sessionId).messages];
    }

    getRecentMessages(sessionId: string, count: number): Message[] {
        if (count <= 0) {
            return [];
        }
        return this.require(sessionId).messages.slice(-count);
    }

    setCrisisFlag(sessionId: string, flag: boolean): void {
        const session = this.require(sessionId);
        session.crisisDetected = flag;
        session.updatedAt = new Date();
    }

    setLanguage(sessionId: string, language: string): void {
        const session = this.require(sessionId);
        session.language = language;
        session.updatedAt = new Date();
    }

    setEmotion(sessionId: string, emotion: EmotionLabel): void {
        const session = this.require(sessionId);
        session.lastEmotion = emotion;
        session.updatedAt = new Date();
    }

    /**
     * Discard a session once any turn already running on it has finished.
     */
    clear(sessionId: string): Promise<void> {
        return this.runExclusive(sessionId, async () => {
            this.require(sessionId);
            this.sessions.delete(sessionId);
        });
    }

    /**
     * Run `task` with exclusive access to one session. Calls for the same id
     * run one at a time in call order; other sessions are unaffected.
     */
    runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
        return this.locks.runExclusive(sessionId, task);
    }

    getActiveSessionCount(): number {
        return this.sessions.size;
    }

    private require(sessionId: string): Session {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new NotFoundError(`Session not found: ${sessionId}`);
        }
        return session;
    }

    private snapshot(session: Session): Session {
        return { ...session, messages: [...session.messages] };
    }
}
