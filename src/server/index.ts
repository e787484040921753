// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { createApp, createPseudonymizer } from './app';
import { loadConfig } from './utils/config';
import type { Pseudonymizer } from './services/pseudonymizer.service';
import type { ServerConfig } from './utils/config';

// Validate configuration and build the pseudonymizer at startup so a bad
// name-parts file or variable stops the process before it takes requests
let config: ServerConfig;
let pseudonymizer: Pseudonymizer;

try {
  config = loadConfig();
  // eslint-disable-next-line no-console
  console.log('✓ Environment variable validation passed');

  pseudonymizer = createPseudonymizer(config);
  const summary = pseudonymizer.summary();
  // eslint-disable-next-line no-console
  console.log(
    `✓ Pseudonymizer initialized with ${summary.total} pseudonyms ` +
      `(${summary.totalAlliterations} alliterations)` +
      (config.namePartsFile ? ` from ${config.namePartsFile}` : '')
  );
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('✗ Configuration error:', error instanceof Error ? error.message : error);
  // eslint-disable-next-line no-console
  console.error('Server cannot start without valid configuration.');
  process.exit(1);
}

const app = createApp(config, pseudonymizer);

const server = app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`Server listening on port ${config.port}`);
});

server.on('error', (error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

export default server;
