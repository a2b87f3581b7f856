import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { logger } from '../infrastructure/logger.js';
import { Supervisor } from '../services/supervision/index.js';

function main(): void {
  const config = loadConfig();
  const supervisor = new Supervisor({ config: config.supervision });
  const app = createApp(supervisor);

  app.listen(config.port, () => {
    logger.info({ port: config.port }, 'NEO supervision API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
