/**
 * Debug Mentor - Entry Point
 *
 * Adaptive tutoring for programming learners: confusion tracking, staged
 * debugging hints, flashcards for recurring mistakes and a per-user
 * session history.
 *
 * Starts the HTTP API. For the command line, see src/cli/index.ts.
 */

import { config, validateConfig, ConfigValidationError } from './config';
import { createTutor } from './bootstrap';
import { startServer } from './api';

try {
  validateConfig();
} catch (error) {
  if (error instanceof ConfigValidationError) {
    console.error(`[Config] ${error.message}`);
    process.exit(1);
  }
  throw error;
}

const tutor = createTutor(config);

startServer(
  tutor.orchestrator,
  {
    port: config.server.port,
    host: config.server.host,
    nodeEnv: config.server.nodeEnv,
  },
  () => tutor.db.$client.close()
);
