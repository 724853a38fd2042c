import dotenv from 'dotenv';
import { logger } from 'firebase-functions';
import { createApp } from './app';
import { loadConfig } from './config';
import { earthEngine } from './services/gee';
import { EarthEngineSession } from './services/session';
import { errorMessage } from './utils/errors';

dotenv.config();

async function main() {
  const config = loadConfig();
  const session = new EarthEngineSession(earthEngine, config.credentialsFile);
  await session.reinitialize();

  const app = createApp({ config, client: earthEngine, session });
  app.listen(config.port, '0.0.0.0', () => {
    logger.info(`Listening on 0.0.0.0:${config.port}`);
  });
}

main().catch((err) => {
  logger.error(`Server failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
