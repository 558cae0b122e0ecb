// In-process stand-ins for the outbound services used in tests
import {
    ChatTurn,
    CompletionService,
    DeliveryChannel,
    DeliveryChannelName,
    DeliveryReceipt,
    SpeechSynthesisService,
    SynthesizedAudio,
    TranscriptionRequest,
    TranscriptionResult,
    TranscriptionService
} from '../types';
import { AppConfig, loadConfig } from '../config/Config';
import { AppContext, AppServices, createAppContext } from '../components/AppContext';

export const TEST_ENV = {
    BOT_TOKEN: '123456789:ABCdefGHIjklMNOpqrSTUvwxYZ123456789',
    NODE_ENV: 'test',
    DELIVERY_MODE: 'simulated'
};

export const createTestConfig = (overrides: Record<string, string> = {}): AppConfig => {
    return loadConfig({ ...TEST_ENV, ...overrides });
};

/** Resolves after `ms` unless the signal aborts first */
const delay = (ms: number, signal?: AbortSignal): Promise<void> => {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(new Error('aborted'));
        });
    });
};

export class FakeTranscriptionService implements TranscriptionService {
    readonly requests: TranscriptionRequest[] = [];
    text = 'hello there';
    failWith: Error | null = null;
    delayMs = 0;

    async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
        this.requests.push(request);
        if (this.delayMs > 0) {
            await delay(this.delayMs, request.signal);
        }
        if (this.failWith) {
            throw this.failWith;
        }
        return { text: this.text, language: request.language ?? 'en' };
    }
}

export class FakeCompletionService implements CompletionService {
    readonly calls: ChatTurn[][] = [];
    reply = 'I hear you. Tell me more about what is going on.';
    failWith: Error | null = null;
    delayMs = 0;

    async complete(turns: ChatTurn[], signal?: AbortSignal): Promise<string> {
        this.calls.push(turns.map(turn => ({ ...turn })));
        if (this.delayMs > 0) {
            await delay(this.delayMs, signal);
        }
        if (this.failWith) {
            throw this.failWith;
        }
        return this.reply;
    }
}

export class FakeSpeechSynthesisService implements SpeechSynthesisService {
    readonly texts: string[] = [];
    failWith: Error | null = null;
    private counter = 0;

    async synthesize(text: string): Promise<SynthesizedAudio> {
        this.texts.push(text);
        if (this.failWith) {
            throw this.failWith;
        }
        this.counter += 1;
        return {
            audioId: `audio_test_${this.counter}`,
            mimeType: 'audio/ogg',
            data: Buffer.from(`speech:${text}`)
        };
    }
}

export interface SentMessage {
    to: string;
    body: string;
}

export type ChannelBehaviour = 'succeed' | 'fail' | 'hang';

export class FakeDeliveryChannel implements DeliveryChannel {
    readonly name: DeliveryChannelName;
    readonly sent: SentMessage[] = [];
    available = true;
    behaviour: ChannelBehaviour = 'succeed';
    /** Per-recipient behaviour, checked before `behaviour` */
    behaviourFor: Map<string, ChannelBehaviour> = new Map();
    /** Recipients whose send was aborted while hanging */
    readonly aborted: string[] = [];
    private counter = 0;

    constructor(name: DeliveryChannelName) {
        this.name = name;
    }

    isAvailable(): boolean {
        return this.available;
    }

    async send(to: string, body: string, signal?: AbortSignal): Promise<DeliveryReceipt> {
        this.sent.push({ to, body });
        const behaviour = this.behaviourFor.get(to) ?? this.behaviour;
        if (behaviour === 'fail') {
            throw new Error(`${this.name} provider rejected message`);
        }
        if (behaviour === 'hang') {
            try {
                await delay(60000, signal);
            } catch (error) {
                this.aborted.push(to);
                throw error;
            }
        }
        this.counter += 1;
        return { providerMessageId: `${this.name.toUpperCase()}${this.counter}`, providerStatus: 'queued' };
    }
}

export interface TestHarness {
    context: AppContext;
    services: {
        transcription: FakeTranscriptionService;
        completion: FakeCompletionService;
        synthesis: FakeSpeechSynthesisService;
        whatsapp: FakeDeliveryChannel;
        sms: FakeDeliveryChannel;
    };
}

export const createTestHarness = (overrides: Record<string, string> = {}): TestHarness => {
    const services = {
        transcription: new FakeTranscriptionService(),
        completion: new FakeCompletionService(),
        synthesis: new FakeSpeechSynthesisService(),
        whatsapp: new FakeDeliveryChannel('whatsapp'),
        sms: new FakeDeliveryChannel('sms')
    };
    const appServices: AppServices = services;
    return {
        context: createAppContext(createTestConfig(overrides), appServices),
        services
    };
};
