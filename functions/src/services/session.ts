import { logger } from 'firebase-functions';
import { SessionError, errorMessage } from '../utils/errors';
import { loadServiceAccountKey } from './credentials';
import { EarthEngineClient } from './gee';

export type SessionState = 'uninitialized' | 'valid' | 'expired';

/**
 * Process-wide Earth Engine session. Every refresh goes through one shared
 * promise, so concurrent requests that find the token expired wait on the
 * same key exchange instead of racing each other.
 */
export class EarthEngineSession {
  private initialized = false;
  private pending: Promise<void> | null = null;

  constructor(
    private readonly client: EarthEngineClient,
    private readonly credentialsFile: string
  ) {}

  get state(): SessionState {
    if (!this.initialized) return 'uninitialized';
    return this.client.hasValidToken() ? 'valid' : 'expired';
  }

  async ensureInitialized(): Promise<void> {
    const state = this.state;
    if (state === 'valid') return;
    if (state === 'expired') {
      logger.info('Earth Engine credentials expired. Reinitializing...');
    }
    await this.reinitialize();
  }

  reinitialize(): Promise<void> {
    if (!this.pending) {
      this.pending = this.initialize().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async initialize(): Promise<void> {
    try {
      const key = await loadServiceAccountKey(this.credentialsFile);
      await this.client.authenticate(key);
      this.initialized = true;
      logger.info('Earth Engine initialized successfully');
    } catch (err) {
      logger.error(`Failed to initialize Earth Engine: ${errorMessage(err)}`);
      throw new SessionError(errorMessage(err), { cause: err });
    }
  }
}
