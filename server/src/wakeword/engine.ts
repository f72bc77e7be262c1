/**
 * Wakeword Engine
 * Answers "was the wake phrase just uttered?" for each microphone frame.
 *
 * The detection itself is delegated to one of several interchangeable
 * strategies, picked from configuration. If the configured backend cannot
 * start (missing access key, missing model) the engine falls back along an
 * explicit chain and ends on energy detection. A backend lost while running
 * (a dropped streaming connection) is replaced from the same chain.
 */

import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { WakeWordBackendError } from '../errors.js';
import { durationMs } from '../audio/pcm.js';
import { EnergyStrategy } from './EnergyStrategy.js';
import { PorcupineStrategy } from './PorcupineStrategy.js';
import { TranscriptStrategy } from './TranscriptStrategy.js';
import { RealtimeTranscriptionClient } from './RealtimeTranscriptionClient.js';
import type { AudioFrame, DetectorConfig, WakeWordMethod } from '../types/index.js';

export interface WakeWordStrategy {
  readonly method: WakeWordMethod;

  /**
   * Exact number of samples `process` expects
   */
  readonly frameLength: number;

  readonly sampleRate: number;

  /**
   * Hits within this much audio after a detection are suppressed
   */
  readonly refractoryMs: number;

  /**
   * Feed one frame; true on a positive classification
   */
  process(frame: AudioFrame): boolean;

  /**
   * False once the backend is lost for good; the engine then moves on
   * along its fallback chain
   */
  isAvailable(): boolean;

  /**
   * Drop anything buffered from before detection was paused
   */
  reset(): void;

  /**
   * Release backend resources
   */
  release(): void;
}

export type FallbackFactory = () => WakeWordStrategy;

export class WakeWordEngine {
  private samplesSinceWake = Number.POSITIVE_INFINITY;
  private released = false;
  private onFallback: boolean;

  constructor(
    private strategy: WakeWordStrategy,
    readonly config: DetectorConfig,
    /** True when running on a fallback instead of the configured method */
    degraded: boolean = false,
    private fallback: FallbackFactory | null = null
  ) {
    this.onFallback = degraded;
  }

  get method(): WakeWordMethod {
    return this.strategy.method;
  }

  get degraded(): boolean {
    return this.onFallback;
  }

  get frameLength(): number {
    return this.strategy.frameLength;
  }

  get sampleRate(): number {
    return this.strategy.sampleRate;
  }

  /**
   * Start a new listening session: earlier detections no longer suppress
   * hits, and audio or transcripts buffered before the pause are dropped.
   */
  reset(): void {
    this.samplesSinceWake = Number.POSITIVE_INFINITY;
    this.strategy.reset();
  }

  detect(frame: AudioFrame): boolean {
    if (this.released) {
      throw new Error('Wake word engine has been released');
    }
    if (!this.strategy.isAvailable()) {
      this.switchToFallback();
    }
    if (frame.length !== this.strategy.frameLength) {
      throw new RangeError(
        `Wake word engine expects ${this.strategy.frameLength} samples per frame, got ${frame.length}`
      );
    }

    this.samplesSinceWake += frame.length;
    if (!this.strategy.process(frame)) return false;

    const sinceLastMs = durationMs(this.samplesSinceWake, this.strategy.sampleRate);
    if (sinceLastMs < this.strategy.refractoryMs) {
      logger.debug('WakeWord', `Suppressed repeat detection (${Math.round(sinceLastMs)}ms after last)`);
      return false;
    }

    this.samplesSinceWake = 0;
    logger.info('WakeWord', `Wake word detected! (${this.strategy.method})`);
    return true;
  }

  private switchToFallback(): void {
    const lost = this.strategy;
    if (!this.fallback) {
      throw new WakeWordBackendError(`${lost.method} wake word backend is unavailable`);
    }

    logger.warn('WakeWord', `${lost.method} backend lost, switching to fallback`);
    const next = this.fallback();
    lost.release();
    this.strategy = next;
    this.fallback = null;
    this.onFallback = true;
    this.samplesSinceWake = Number.POSITIVE_INFINITY;
    logger.warn('WakeWord', `Wake word running on ${next.method} fallback instead of ${this.config.method}`);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.strategy.release();
    logger.info('WakeWord', `Released ${this.strategy.method} detector`);
  }
}

// ============== Construction ==============

export type StrategyFactory = (config: DetectorConfig) => WakeWordStrategy;
export type StrategyFactories = Record<WakeWordMethod, StrategyFactory>;

export const defaultStrategyFactories: StrategyFactories = {
  model: (config) => new PorcupineStrategy(config, ENV.PORCUPINE_ACCESS_KEY, ENV.WAKE_REFRACTORY_MS),
  streaming: (config) => new TranscriptStrategy(config, new RealtimeTranscriptionClient()),
  energy: (config) => new EnergyStrategy(config, ENV.WAKE_REFRACTORY_MS),
};

/**
 * Methods to try, in order, for a configured method
 */
export function fallbackChain(method: WakeWordMethod): WakeWordMethod[] {
  return method === 'energy' ? ['energy'] : [method, 'energy'];
}

function buildStrategy(
  methods: WakeWordMethod[],
  config: DetectorConfig,
  factories: StrategyFactories
): WakeWordStrategy {
  for (const method of methods) {
    try {
      const strategy = factories[method](config);
      logger.info('WakeWord', `Wake word detector ready - method: ${method}, keyword: '${config.keyword}'`, {
        frameLength: strategy.frameLength,
        sampleRate: strategy.sampleRate,
      });
      return strategy;
    } catch (err) {
      logger.error('WakeWord', `Failed to initialize ${method} detector`, err);
    }
  }

  throw new WakeWordBackendError(`No wake word detector could be initialized for '${config.method}'`);
}

/**
 * Build the first backend along the fallback chain that starts. The rest of
 * the chain stays available for a backend that is lost later.
 */
export function createWakeWordEngine(
  config: DetectorConfig,
  factories: StrategyFactories = defaultStrategyFactories
): WakeWordEngine {
  const chain = fallbackChain(config.method);
  const strategy = buildStrategy(chain, config, factories);

  const degraded = strategy.method !== config.method;
  if (degraded) {
    logger.warn('WakeWord', `Wake word running on ${strategy.method} fallback instead of ${config.method}`);
  }

  const rest = chain.slice(chain.indexOf(strategy.method) + 1);
  const fallback = rest.length > 0 ? () => buildStrategy(rest, config, factories) : null;
  return new WakeWordEngine(strategy, config, degraded, fallback);
}
