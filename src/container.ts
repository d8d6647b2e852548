/**
 * Dependency wiring.
 * Constructs every service with its collaborators. Production passes the
 * WebSocket transport and OpenAI classifier; tests pass fakes.
 */

import type { PipelineConfig } from './config.js';
import type { IAlertChannel } from './providers/IAlertChannel.js';
import type { IContentClassifier } from './providers/IContentClassifier.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITakeoverRepository } from './repositories/ITakeoverRepository.js';
import type { IAuditRepository } from './repositories/IAuditRepository.js';
import { InMemoryTakeoverRepository } from './repositories/InMemoryTakeoverRepository.js';
import { InMemoryAuditRepository } from './repositories/InMemoryAuditRepository.js';
import type { ITransport } from './transport/ITransport.js';
import type { Message, TriagedItem } from './types/models.js';
import { AlertManager } from './services/AlertManager.js';
import { AuditLedger } from './services/AuditLedger.js';
import { AutoRecovery } from './services/AutoRecovery.js';
import { ConnectionRegistry } from './services/ConnectionRegistry.js';
import { Deduplicator } from './services/Deduplicator.js';
import { ErrorHandler } from './services/ErrorHandler.js';
import { EscalationClassifier } from './services/EscalationClassifier.js';
import { PriorityTriageQueue } from './services/PriorityTriageQueue.js';
import { TriagePipeline } from './services/TriagePipeline.js';

export interface Container {
  config: PipelineConfig;
  logProvider: ILogProvider;
  alertManager: AlertManager;
  recovery: AutoRecovery;
  errorHandler: ErrorHandler;
  deduplicator: Deduplicator;
  queue: PriorityTriageQueue;
  escalation: EscalationClassifier;
  ledger: AuditLedger;
  pipeline: TriagePipeline;
  registry: ConnectionRegistry;
}

export function createContainer(deps: {
  config: PipelineConfig;
  transport: ITransport;
  classifier: IContentClassifier;
  logProvider: ILogProvider;
  alertChannels?: { channel: IAlertChannel; minLevel: 'fatal' | 'error' }[];
  takeoverRepo?: ITakeoverRepository;
  auditRepo?: IAuditRepository;
}): Container {
  const { config, logProvider } = deps;

  const alertManager = new AlertManager(logProvider.child('alerts'), deps.alertChannels ?? [], {
    cooldownMs: config.alerts.cooldownMs,
  });
  const recovery = new AutoRecovery(logProvider.child('recovery'), {
    maxRetries: config.recovery.maxRetries,
  });
  const errorHandler = new ErrorHandler(alertManager, recovery, logProvider.child('errors'));

  const deduplicator = new Deduplicator(config.dedup);
  const queue = new PriorityTriageQueue(config.queueMaxSize);
  const escalation = new EscalationClassifier(config.escalation);
  const ledger = new AuditLedger(
    deps.takeoverRepo ?? new InMemoryTakeoverRepository(),
    deps.auditRepo ?? new InMemoryAuditRepository(),
    logProvider.child('ledger')
  );

  // Room id → connection name, so replies go back where the message came from.
  const routes = new Map<string, string>();

  const sendReply = async (item: TriagedItem, reply: string): Promise<boolean> => {
    const { roomId, senderId } = item.message;
    const supervisor = registry.get(routes.get(roomId) ?? roomId);
    if (!supervisor) {
      logProvider.warn('No connection for reply', { roomId });
      return false;
    }
    return supervisor.send({ type: 'reply', room_id: roomId, reply_to: senderId, content: reply });
  };

  const pipeline = new TriagePipeline(
    {
      deduplicator,
      queue,
      escalation,
      ledger,
      classifier: deps.classifier,
      errorHandler,
      logger: logProvider.child('pipeline'),
      onReply: sendReply,
    },
    { classifierTimeoutMs: config.classifier.timeoutMs }
  );

  const registry = new ConnectionRegistry(
    deps.transport,
    errorHandler,
    logProvider.child('connections'),
    config.supervisor,
    (name) => ({
      onMessage: (message: Message) => {
        const routed = message.roomId ? message : Object.freeze({ ...message, roomId: name });
        routes.set(routed.roomId, name);
        pipeline.ingest(routed);
      },
      onEvent: (event) => pipeline.recordEvent(event),
    })
  );

  return {
    config,
    logProvider,
    alertManager,
    recovery,
    errorHandler,
    deduplicator,
    queue,
    escalation,
    ledger,
    pipeline,
    registry,
  };
}
