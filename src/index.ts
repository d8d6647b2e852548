export * from './errors.js';
export * from './config.js';
export { createContainer, type Container } from './container.js';
export type * from './types/models.js';
export type * from './types/frames.js';
export { KNOWN_FRAME_TYPES } from './types/frames.js';

export type { ILogProvider, LogEvent, LogLevel } from './providers/ILogProvider.js';
export { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
export type { IAlertChannel } from './providers/IAlertChannel.js';
export { WebhookAlertChannel, type WebhookFormat } from './providers/WebhookAlertChannel.js';
export type { IContentClassifier, ClassificationResult } from './providers/IContentClassifier.js';
export { OpenAIContentClassifier, parseClassification } from './providers/OpenAIContentClassifier.js';

export type { ITransport, ITransportConnection, TransportOpenOptions } from './transport/ITransport.js';
export { WebSocketTransport } from './transport/WebSocketTransport.js';

export { ConnectionSupervisor, DEFAULT_SUPERVISOR_OPTIONS } from './services/ConnectionSupervisor.js';
export type { SupervisorOptions, SupervisorListeners, ConnectionStats } from './services/ConnectionSupervisor.js';
export { ConnectionRegistry } from './services/ConnectionRegistry.js';
export { decodeFrame, type DecodeResult } from './services/FrameDecoder.js';
export { Deduplicator } from './services/Deduplicator.js';
export { PriorityTriageQueue } from './services/PriorityTriageQueue.js';
export { EscalationClassifier } from './services/EscalationClassifier.js';
export { defaultEscalationConfig, type EscalationConfig } from './services/keywords.js';
export { AuditLedger } from './services/AuditLedger.js';
export { ErrorClassifier } from './services/ErrorClassifier.js';
export { AlertManager } from './services/AlertManager.js';
export { AutoRecovery } from './services/AutoRecovery.js';
export { ErrorHandler } from './services/ErrorHandler.js';
export { TriagePipeline } from './services/TriagePipeline.js';
