import { AppConfig, LlmConfig } from '../config/Config';
import {
    CompletionService,
    DeliveryChannel,
    SpeechSynthesisService,
    TranscriptionService
} from '../types/Integrations';
import {
    AlertComposer,
    AlertDispatcher,
    ConversationOrchestrator,
    CrisisDetector,
    EmergencyProfileManager,
    EscalationManager,
    SessionManager
} from '../managers';
import {
    OpenAICompletionService,
    OpenAISpeechSynthesisService,
    OpenAITranscriptionService,
    createOpenAIClient
} from '../integrations/OpenAIConversationServices';
import { isSpeechVoice } from '../integrations/speechVoices';

export interface ConversationServices {
    transcription: TranscriptionService;
    completion: CompletionService;
    synthesis: SpeechSynthesisService | null;
}

export interface AppServices extends ConversationServices {
    whatsapp: DeliveryChannel | null;
    sms: DeliveryChannel | null;
}

export interface AppContext {
    config: AppConfig;
    sessionManager: SessionManager;
    detector: CrisisDetector;
    profileManager: EmergencyProfileManager;
    composer: AlertComposer;
    dispatcher: AlertDispatcher;
    orchestrator: ConversationOrchestrator;
    escalation: EscalationManager;
}

export const createConversationServices = (llm: LlmConfig): ConversationServices => {
    if (!llm.apiKey) {
        throw new Error('Required environment variable LLM_API_KEY is not set');
    }
    if (!isSpeechVoice(llm.speechVoice)) {
        throw new Error(`Unsupported speech voice: ${llm.speechVoice}`);
    }

    const client = createOpenAIClient(llm);
    return {
        transcription: new OpenAITranscriptionService(client, llm.transcriptionModel),
        completion: new OpenAICompletionService(client, llm.completionModel),
        synthesis: new OpenAISpeechSynthesisService(client, llm.speechModel, llm.speechVoice)
    };
};

/**
 * Wire every manager from a config and a set of outbound services.
 */
export const createAppContext = (config: AppConfig, services: AppServices): AppContext => {
    const sessionManager = new SessionManager(config.defaultLanguage);
    const detector = new CrisisDetector();
    const profileManager = new EmergencyProfileManager();
    const composer = new AlertComposer(sessionManager, profileManager, detector, {
        recentMessageCount: config.recentMessageCount
    });
    const dispatcher = new AlertDispatcher({
        whatsapp: services.whatsapp,
        sms: services.sms,
        mode: config.deliveryMode,
        deliveryTimeoutMs: config.timeouts.deliveryMs
    });
    const orchestrator = new ConversationOrchestrator(
        sessionManager,
        detector,
        {
            transcription: services.transcription,
            completion: services.completion,
            synthesis: services.synthesis
        },
        {
            timeouts: config.timeouts,
            maxAudioSizeMb: config.maxAudioSizeMb,
            historyWindow: config.historyWindow
        }
    );
    const escalation = new EscalationManager(profileManager, composer, dispatcher);

    return {
        config,
        sessionManager,
        detector,
        profileManager,
        composer,
        dispatcher,
        orchestrator,
        escalation
    };
};
