/**
 * Production container: `ws` transport, OpenAI classifier, webhook alerting.
 */

import { loadConfig, type PipelineConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { OpenAIContentClassifier } from './providers/OpenAIContentClassifier.js';
import { WebhookAlertChannel } from './providers/WebhookAlertChannel.js';
import type { IAlertChannel } from './providers/IAlertChannel.js';
import { WebSocketTransport } from './transport/WebSocketTransport.js';

let cached: Container | null = null;

export function getProductionContainer(config: PipelineConfig = loadConfig()): Container {
  if (cached) return cached;

  if (!config.classifier.apiKey) {
    throw new Error('Missing required environment variable: OPENAI_API_KEY');
  }

  const alertChannels: { channel: IAlertChannel; minLevel: 'fatal' | 'error' }[] = [];
  if (config.alerts.webhookUrl) {
    alertChannels.push({
      channel: new WebhookAlertChannel({ url: config.alerts.webhookUrl, format: 'json' }),
      minLevel: 'error',
    });
  }
  if (config.alerts.feishuWebhookUrl) {
    alertChannels.push({
      channel: new WebhookAlertChannel({ url: config.alerts.feishuWebhookUrl, format: 'feishu' }),
      minLevel: 'fatal',
    });
  }
  if (config.alerts.wecomWebhookUrl) {
    alertChannels.push({
      channel: new WebhookAlertChannel({ url: config.alerts.wecomWebhookUrl, format: 'wecom' }),
      minLevel: 'fatal',
    });
  }

  cached = createContainer({
    config,
    transport: new WebSocketTransport(),
    classifier: new OpenAIContentClassifier({
      apiKey: config.classifier.apiKey,
      model: config.classifier.model,
    }),
    logProvider: new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel }),
    alertChannels,
  });

  return cached;
}
