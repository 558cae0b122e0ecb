export type MessageRole = 'user' | 'assistant';

export interface Message {
    messageId: string;
    sessionId: string;
    role: MessageRole;
    content: string;
    audioRef?: string;
    timestamp: Date;
}
