import 'dotenv/config';
import logger from './logger';
import { resolveSettings } from './config/settings';
import { startService } from './server';

async function runServer() {
  try {
    const settings = resolveSettings();
    logger.level = settings.logLevel;
    await startService(settings);
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

void runServer();
