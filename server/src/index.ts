/**
 * Smart Glasses Voice Engine Entry Point
 */

import { ENV, validateConfig } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { wsServer } from './websocket/server.js';
import { orchestrator } from './orchestrator/index.js';
import { MicrophoneUnavailableError } from './errors.js';

async function main(): Promise<void> {
  console.log(`
  ╔══════════════════════════════════════╗
  ║      Smart Glasses Voice Engine      ║
  ║               v0.1.0                 ║
  ╚══════════════════════════════════════╝
  `);

  validateConfig();

  // Builds the wake word engine; falls back to energy detection on misconfiguration
  orchestrator.initialize();

  const app = createApp(orchestrator);
  const httpServer = app.listen(ENV.SERVER_PORT, () => {
    logger.info('Server', `HTTP server running on http://localhost:${ENV.SERVER_PORT}`);
  });

  // WebSocket server shares the HTTP port
  wsServer.attach(httpServer);

  let shuttingDown = false;
  const shutdown = (code: number): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Server', 'Shutting down...');
    orchestrator.shutdown();
    wsServer.stop();
    httpServer.close();
    process.exit(code);
  };

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));
  orchestrator.on('shutdownRequested', () => {
    logger.info('Server', 'Shutdown requested by voice command');
  });

  try {
    await orchestrator.start();
    shutdown(0);
  } catch (err) {
    if (err instanceof MicrophoneUnavailableError) {
      logger.error('Server', 'Microphone unavailable - cannot run without audio input', err);
    } else {
      logger.error('Server', 'Voice engine stopped unexpectedly', err);
    }
    shutdown(1);
  }
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
