import { EmotionLabel } from './Crisis';
import { Message } from './Message';

export interface Session {
    sessionId: string;
    language: string;
    messages: Message[];
    crisisDetected: boolean;
    lastEmotion: EmotionLabel | null;
    createdAt: Date;
    updatedAt: Date;
}
