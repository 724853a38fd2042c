import { logger } from 'firebase-functions';
import { EarthEngineError, ReauthenticationError, errorMessage } from '../utils/errors';
import { EarthEngineSession } from './session';

/**
 * Runs an Earth Engine call. When the platform rejects it, the session is
 * re-authenticated and the call repeated, at most `maxRetries` times.
 * Errors other than EarthEngineError pass straight through.
 */
export async function withReauthentication<T>(
  session: EarthEngineSession,
  operation: () => Promise<T>,
  maxRetries: number
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof EarthEngineError) || attempt >= maxRetries) throw err;
      logger.error(`Earth Engine error: ${err.message}`);
      try {
        await session.reinitialize();
      } catch (reauthErr) {
        throw new ReauthenticationError(errorMessage(reauthErr), { cause: reauthErr });
      }
      logger.info('Retrying the operation after Earth Engine reinitialization...');
    }
  }
}
