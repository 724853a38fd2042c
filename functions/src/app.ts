import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { logger } from 'firebase-functions';
import { AppConfig } from './config';
import { EarthEngineClient } from './services/gee';
import { parseIndexRequest, visualizationFor } from './services/indices';
import { withReauthentication } from './services/retry';
import { EarthEngineSession } from './services/session';
import {
  EarthEngineError,
  ReauthenticationError,
  SessionError,
  ValidationError,
  errorMessage
} from './utils/errors';

export type AppDeps = {
  config: Pick<AppConfig, 'composite' | 'thumbnailDimensions' | 'maxRetries'>;
  client: EarthEngineClient;
  session: EarthEngineSession;
};

export const WELCOME_MESSAGE =
  'Welcome to the Earth Engine API. Use the /calculate_indices endpoint to perform calculations.';

// body-parser attaches a 4xx `status` to the errors it raises for bad requests.
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function sendError(res: Response, err: unknown) {
  if (err instanceof ValidationError) {
    logger.warn(`Rejected request: ${err.message}`);
    return res.status(err.status).json({ error: err.message });
  }
  if (err instanceof SessionError) {
    return res.status(500).json({ error: `Failed to initialize Earth Engine: ${err.message}` });
  }
  if (err instanceof ReauthenticationError) {
    logger.error(`Failed to reinitialize Earth Engine: ${err.message}`);
    return res.status(500).json({ error: `Failed to reinitialize Earth Engine: ${err.message}` });
  }
  if (err instanceof EarthEngineError) {
    logger.error(`Earth Engine error: ${err.message}`);
    return res.status(500).json({ error: `Earth Engine error: ${err.message}` });
  }
  logger.error(`An unexpected error occurred: ${errorMessage(err)}`);
  return res.status(500).json({ error: `An unexpected error occurred: ${errorMessage(err)}` });
}

export function createApp({ config, client, session }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ message: WELCOME_MESSAGE });
  });

  app.post('/calculate_indices', async (req, res) => {
    try {
      const { coordinates, index } = parseIndexRequest(req.body);
      await session.ensureInitialized();
      const url = await withReauthentication(
        session,
        () =>
          client.getThumbnailUrl({
            coordinates,
            index,
            visualization: visualizationFor(index),
            composite: config.composite,
            dimensions: config.thumbnailDimensions
          }),
        config.maxRetries
      );
      logger.debug(`Generated URL: ${url}`);
      res.json({ url, coordinates, index });
    } catch (err) {
      sendError(res, err);
    }
  });

  // Body parser failures land here before any route runs.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = clientErrorStatus(err);
    if (status === undefined) {
      sendError(res, err);
      return;
    }
    const message = err instanceof SyntaxError ? 'Malformed JSON body' : errorMessage(err);
    logger.warn(`Rejected request body: ${errorMessage(err)}`);
    res.status(status).json({ error: message });
  });

  return app;
}
