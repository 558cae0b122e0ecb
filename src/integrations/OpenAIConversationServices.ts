import OpenAI, { toFile } from 'openai';
import {
    ChatTurn,
    CompletionService,
    SpeechSynthesisService,
    SynthesizedAudio,
    TranscriptionRequest,
    TranscriptionResult,
    TranscriptionService
} from '../types/Integrations';
import { LlmConfig } from '../config/Config';
import { generateAudioId } from '../models/utils';
import { SpeechVoice } from './speechVoices';

export interface CompletionTuning {
    temperature: number;
    maxTokens: number;
    topP: number;
}

export const DEFAULT_COMPLETION_TUNING: CompletionTuning = {
    temperature: 0.7,
    maxTokens: 500,
    topP: 0.9
};

export const createOpenAIClient = (config: LlmConfig): OpenAI => {
    return new OpenAI({
        apiKey: config.apiKey,
        // Any OpenAI-compatible endpoint works here, e.g. Groq
        baseURL: config.baseUrl
    });
};

const toMessageParam = (turn: ChatTurn): OpenAI.ChatCompletionMessageParam => {
    switch (turn.role) {
        case 'system':
            return { role: 'system', content: turn.content };
        case 'user':
            return { role: 'user', content: turn.content };
        case 'assistant':
            return { role: 'assistant', content: turn.content };
    }
};

export class OpenAITranscriptionService implements TranscriptionService {
    private client: OpenAI;
    private model: string;

    constructor(client: OpenAI, model: string) {
        this.client = client;
        this.model = model;
    }

    async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
        const file = await toFile(request.audio, request.filename);
        const transcription = await this.client.audio.transcriptions.create(
            {
                file,
                model: this.model,
                ...(request.language ? { language: request.language } : {})
            },
            { signal: request.signal }
        );

        return {
            text: transcription.text,
            language: request.language ?? 'en'
        };
    }
}

export class OpenAICompletionService implements CompletionService {
    private client: OpenAI;
    private model: string;
    private tuning: CompletionTuning;

    constructor(client: OpenAI, model: string, tuning: CompletionTuning = DEFAULT_COMPLETION_TUNING) {
        this.client = client;
        this.model = model;
        this.tuning = tuning;
    }

    async complete(turns: ChatTurn[], signal?: AbortSignal): Promise<string> {
        const response = await this.client.chat.completions.create(
            {
                model: this.model,
                messages: turns.map(toMessageParam),
                temperature: this.tuning.temperature,
                max_tokens: this.tuning.maxTokens,
                top_p: this.tuning.topP
            },
            { signal }
        );

        const choice = response.choices[0];
        return choice?.message.content ?? '';
    }
}

export class OpenAISpeechSynthesisService implements SpeechSynthesisService {
    private client: OpenAI;
    private model: string;
    private voice: SpeechVoice;

    constructor(client: OpenAI, model: string, voice: SpeechVoice) {
        this.client = client;
        this.model = model;
        this.voice = voice;
    }

    async synthesize(text: string, _language: string, signal?: AbortSignal): Promise<SynthesizedAudio> {
        const response = await this.client.audio.speech.create(
            {
                model: this.model,
                voice: this.voice,
                input: text,
                response_format: 'opus'
            },
            { signal }
        );

        return {
            audioId: generateAudioId(),
            mimeType: 'audio/ogg',
            data: Buffer.from(await response.arrayBuffer())
        };
    }
}
