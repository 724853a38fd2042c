import * as functions from 'firebase-functions';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { earthEngine } from './services/gee';
import { EarthEngineSession } from './services/session';

dotenv.config();

const config = loadConfig();
// Initialized by the first request that needs Earth Engine.
const session = new EarthEngineSession(earthEngine, config.credentialsFile);
const app = createApp({ config, client: earthEngine, session });

export const api = functions.https.onRequest(app);
