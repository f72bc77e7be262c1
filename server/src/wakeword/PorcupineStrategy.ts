/**
 * Porcupine keyword spotting
 * The model dictates frame length and sample rate; the capture loop reads
 * frames of exactly that size.
 */

import { Porcupine, BuiltinKeyword } from '@picovoice/porcupine-node';
import { logger } from '../utils/logger.js';
import { WakeWordBackendError } from '../errors.js';
import type { WakeWordStrategy } from './engine.js';
import type { AudioFrame, DetectorConfig } from '../types/index.js';

// Spoken phrases mapped onto Porcupine's built-in keywords
const KEYWORD_MAP: Record<string, BuiltinKeyword> = {
  'hey glasses': BuiltinKeyword.COMPUTER,
  'hey jarvis': BuiltinKeyword.JARVIS,
  'ok google': BuiltinKeyword.OK_GOOGLE,
  'hey google': BuiltinKeyword.HEY_GOOGLE,
  'alexa': BuiltinKeyword.ALEXA,
  'computer': BuiltinKeyword.COMPUTER,
  'porcupine': BuiltinKeyword.PORCUPINE,
};

/**
 * A `.ppn` path is used as a custom keyword file; anything else maps to a
 * built-in keyword, `computer` when unknown.
 */
export function resolvePorcupineKeyword(keyword: string): string {
  const trimmed = keyword.trim();
  if (trimmed.toLowerCase().endsWith('.ppn')) return trimmed;
  return KEYWORD_MAP[trimmed.toLowerCase()] ?? BuiltinKeyword.COMPUTER;
}

export class PorcupineStrategy implements WakeWordStrategy {
  readonly method = 'model' as const;
  readonly frameLength: number;
  readonly sampleRate: number;

  private readonly porcupine: Porcupine;

  constructor(config: DetectorConfig, accessKey: string, readonly refractoryMs: number = 0) {
    if (!accessKey) {
      throw new WakeWordBackendError('PORCUPINE_ACCESS_KEY not configured');
    }

    const keyword = resolvePorcupineKeyword(config.keyword);
    try {
      this.porcupine = new Porcupine(accessKey, [keyword], [config.sensitivity]);
    } catch (err) {
      throw new WakeWordBackendError(`Failed to initialize Porcupine: ${String(err)}`, { cause: err });
    }

    this.frameLength = this.porcupine.frameLength;
    this.sampleRate = this.porcupine.sampleRate;

    logger.info('WakeWord', `Using Porcupine keyword: '${keyword}' for '${config.keyword}'`);
    if (this.sampleRate !== config.sampleRate) {
      logger.warn('WakeWord', `Porcupine requires ${this.sampleRate} Hz audio, configured ${config.sampleRate} Hz`);
    }
  }

  process(frame: AudioFrame): boolean {
    return this.porcupine.process(frame) >= 0;
  }

  isAvailable(): boolean {
    return true;
  }

  // Porcupine keeps no state between frames
  reset(): void {}

  release(): void {
    this.porcupine.release();
  }
}
