/**
 * Express app for the HTTP API
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { ENV } from './config/env.js';
import { createApiRouter } from './routes/api.js';
import type { VoiceService } from './orchestrator/index.js';

export function createApp(service: VoiceService, apiKey: string = ENV.API_KEY): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use('/api', createApiRouter(service, apiKey));
  return app;
}
