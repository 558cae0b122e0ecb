// Export all manager components
export * from './SessionManager';
export * from './CrisisDetector';
export * from './EmergencyProfileManager';
export * from './AlertComposer';
export * from './AlertDispatcher';
export * from './ConversationOrchestrator';
export * from './EscalationManager';
