import { DeliveryChannelName } from './Alert';

export interface TranscriptionRequest {
    audio: Buffer;
    filename: string;
    language?: string;
    signal?: AbortSignal;
}

export interface TranscriptionResult {
    text: string;
    language: string;
}

export interface TranscriptionService {
    transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

export interface ChatTurn {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface CompletionService {
    complete(turns: ChatTurn[], signal?: AbortSignal): Promise<string>;
}

export interface SynthesizedAudio {
    audioId: string;
    mimeType: string;
    data: Buffer;
}

export interface SpeechSynthesisService {
    synthesize(text: string, language: string, signal?: AbortSignal): Promise<SynthesizedAudio>;
}

export interface DeliveryReceipt {
    providerMessageId: string;
    providerStatus: string;
}

export interface DeliveryChannel {
    readonly name: DeliveryChannelName;
    /** Whether the channel has what it needs to send (sender number etc.) */
    isAvailable(): boolean;
    /**
     * `signal` aborts on timeout. A provider request already accepted cannot
     * be recalled, so a timed-out send may still arrive.
     */
    send(to: string, body: string, signal?: AbortSignal): Promise<DeliveryReceipt>;
}
