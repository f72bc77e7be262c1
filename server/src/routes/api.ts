/**
 * API Routes
 * Status and settings endpoints for the companion app
 */

import express, { type RequestHandler, type Router } from 'express';
import { ENV } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { SettingsValidationError } from '../errors.js';
import type { VoiceService } from '../orchestrator/index.js';

/**
 * Rejects requests without a matching X-API-Key header. No-op when no key is configured.
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req, res, next) => {
    if (!apiKey || req.get('X-API-Key') === apiKey) {
      next();
      return;
    }
    logger.warn('API', `Rejected ${req.method} ${req.path}: invalid API key`);
    res.status(401).json({ error: 'Invalid or missing API key' });
  };
}

export function createApiRouter(service: VoiceService, apiKey: string = ENV.API_KEY): Router {
  const router = express.Router();

  /**
   * GET /connection/test
   * Reachability check, never authenticated
   */
  router.get('/connection/test', (_req, res) => {
    res.json({ status: 'ok' });
  });

  router.use(requireApiKey(apiKey));

  /**
   * GET /status
   */
  router.get('/status', (_req, res) => {
    try {
      res.json(service.getStatus());
    } catch (error) {
      logger.error('API', 'Failed to get status', error);
      res.status(500).json({ error: 'Failed to get status' });
    }
  });

  /**
   * GET /settings
   */
  router.get('/settings', (_req, res) => {
    res.json(service.getSettings());
  });

  /**
   * PUT /settings
   * Nested or dotted keys; unknown keys are ignored
   */
  router.put('/settings', (req, res) => {
    try {
      const settings = service.updateSettings(req.body);
      res.json({ success: true, settings });
    } catch (error) {
      if (error instanceof SettingsValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      logger.error('API', 'Failed to update settings', error);
      res.status(500).json({ error: 'Failed to update settings' });
    }
  });

  /**
   * POST /sleep
   * Return to SLEEP at the next tick
   */
  router.post('/sleep', (_req, res) => {
    const requested = service.requestSleep();
    logger.info('API', requested ? 'Sleep requested' : 'Sleep requested while already asleep');
    res.json({ success: true, requested });
  });

  return router;
}
