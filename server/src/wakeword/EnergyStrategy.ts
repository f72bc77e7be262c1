/**
 * Energy-based wake detection
 * Fires on a sudden loud frame relative to recent ambient level. It has no
 * notion of the keyword at all; use it to test the audio path, or as the
 * last fallback when no real detector is available.
 */

import { logger } from '../utils/logger.js';
import { rms } from '../audio/pcm.js';
import type { WakeWordStrategy } from './engine.js';
import type { AudioFrame, DetectorConfig } from '../types/index.js';

export const ENERGY_THRESHOLD = 3000;
export const ENERGY_WINDOW = 5;

export class EnergyStrategy implements WakeWordStrategy {
  readonly method = 'energy' as const;
  readonly frameLength: number;
  readonly sampleRate: number;

  private energies: number[] = [];

  constructor(config: DetectorConfig, readonly refractoryMs: number = 0) {
    this.frameLength = config.frameSize;
    this.sampleRate = config.sampleRate;
    logger.info('WakeWord', 'Energy-based wake word detector initialized');
    logger.warn('WakeWord', 'Energy detection is for testing only - use the model method in production');
  }

  process(frame: AudioFrame): boolean {
    const energy = rms(frame);

    this.energies.push(energy);
    if (this.energies.length > ENERGY_WINDOW) {
      this.energies.shift();
    }

    if (energy <= ENERGY_THRESHOLD) return false;

    const average = this.energies.reduce((sum, e) => sum + e, 0) / this.energies.length;
    if (energy <= average * 2) return false;

    logger.debug('WakeWord', `Energy spike: ${Math.round(energy)} (avg ${Math.round(average)})`);
    // Trailing energy of the same sound must not fire again
    this.energies = [];
    return true;
  }

  isAvailable(): boolean {
    return true;
  }

  reset(): void {
    this.energies = [];
  }

  release(): void {
    this.energies = [];
  }
}
