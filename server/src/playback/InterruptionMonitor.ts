/**
 * Interruption Monitor
 * Listens while a response is being spoken and reports the first
 * recognized speech (barge-in). Every listen is bounded so an abort is
 * noticed within one listen timeout.
 */

import { logger } from '../utils/logger.js';
import type { Listener } from '../speech/UtteranceCapture.js';

export class InterruptionMonitor {
  constructor(
    private readonly listener: Listener,
    private readonly listenTimeoutMs: number
  ) {}

  /**
   * Resolves with the interrupting text, or null once `signal` is aborted.
   * Speech that was already being recorded at the abort is still reported.
   * A failing listener ends monitoring with null.
   */
  async watch(signal: AbortSignal): Promise<string | null> {
    while (!signal.aborted) {
      let heard: string;
      try {
        heard = await this.listener.listen(this.listenTimeoutMs, signal);
      } catch (err) {
        logger.warn('Interrupt', 'Listening for interruptions failed', err);
        return null;
      }

      const text = heard.trim();
      if (text) {
        logger.info('Interrupt', `Interrupted by: "${text}"`);
        return text;
      }
    }
    return null;
  }
}
