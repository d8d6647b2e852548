/**
 * Process entry point: connect every configured room and triage until signalled.
 */

import { getProductionContainer } from './container.production.js';
import { PipelineError } from './errors.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';

async function main(): Promise<void> {
  const { config, registry, pipeline, logProvider } = getProductionContainer();

  if (config.rooms.length === 0) {
    logProvider.warn('LIVE_ROOMS is empty; nothing to connect');
  }

  for (const room of config.rooms) {
    registry.add(room.name, room.url);
  }

  const consumer = pipeline.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logProvider.info('Shutting down', { signal });

    await pipeline.stop();
    await registry.disconnectAll();
    logProvider.info('Shutdown complete', { pipeline: pipeline.stats() });
    await logProvider.flush();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logProvider.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await consumer;
}

main().catch((err: unknown) => {
  // The container may not exist yet, so log through a standalone provider.
  const log = new ConsoleLogProvider({ outputToConsole: true });
  log.error('Startup failed', {
    error: err instanceof Error ? err.message : String(err),
    ...(err instanceof PipelineError && err.details ? { details: err.details } : {}),
  });
  process.exit(1);
});
