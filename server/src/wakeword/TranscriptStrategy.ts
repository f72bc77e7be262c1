/**
 * Streaming-transcript wake detection
 * Audio is streamed to a transcription service; any transcript that
 * contains the keyword phrase counts as a hit. The service segments
 * utterances itself, so no refractory window is applied. A lost connection
 * is retried a bounded number of times before the backend reports itself
 * unavailable.
 */

import { logger } from '../utils/logger.js';
import type { WakeWordStrategy } from './engine.js';
import type { AudioFrame, DetectorConfig } from '../types/index.js';

export interface StreamingTranscriber {
  readonly name: string;
  connect(): Promise<void>;
  sendAudio(pcm: AudioFrame, sampleRate: number): void;
  onTranscript(handler: (text: string) => void): void;
  disconnect(): void;
  isConnected(): boolean;
}

/**
 * Lowercase, strip punctuation, collapse whitespace
 */
export function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Whole-word containment of an already normalized phrase */
export function containsPhrase(transcript: string, phrase: string): boolean {
  if (!phrase) return false;
  return ` ${normalizePhrase(transcript)} `.includes(` ${phrase} `);
}

export interface ReconnectPolicy {
  /** Consecutive failed connection attempts before the backend is given up */
  maxAttempts: number;
  delayMs: number;
}

export const DEFAULT_RECONNECT: ReconnectPolicy = { maxAttempts: 3, delayMs: 1000 };

export class TranscriptStrategy implements WakeWordStrategy {
  readonly method = 'streaming' as const;
  readonly refractoryMs = 0;
  readonly frameLength: number;
  readonly sampleRate: number;

  private readonly phrase: string;
  private transcripts: string[] = [];
  private connecting: Promise<void> | null = null;
  private failedAttempts = 0;
  private released = false;

  constructor(
    config: DetectorConfig,
    private readonly transcriber: StreamingTranscriber,
    private readonly reconnect: ReconnectPolicy = DEFAULT_RECONNECT
  ) {
    this.frameLength = config.frameSize;
    this.sampleRate = config.sampleRate;
    this.phrase = normalizePhrase(config.keyword);

    transcriber.onTranscript((text) => this.transcripts.push(text));
    this.ensureConnected();
    logger.info('WakeWord', `Streaming transcript detector listening for '${this.phrase}'`);
  }

  process(frame: AudioFrame): boolean {
    if (!this.transcriber.isConnected()) {
      this.ensureConnected();
    }
    this.transcriber.sendAudio(frame, this.sampleRate);
    if (this.transcripts.length === 0) return false;

    const heard = this.transcripts.splice(0);
    return heard.some((text) => containsPhrase(text, this.phrase));
  }

  isAvailable(): boolean {
    return this.failedAttempts < this.reconnect.maxAttempts;
  }

  reset(): void {
    this.transcripts = [];
  }

  release(): void {
    this.released = true;
    this.transcripts = [];
    this.transcriber.disconnect();
  }

  /**
   * Start a connection attempt unless one is running. Attempts after a
   * failure wait `delayMs`; a success resets the failure count.
   */
  private ensureConnected(): void {
    if (this.connecting || this.released || !this.isAvailable()) return;

    const name = this.transcriber.name;
    const pause = this.failedAttempts > 0 ? wait(this.reconnect.delayMs) : Promise.resolve();

    this.connecting = pause
      .then(async () => {
        if (this.released) return;
        await this.transcriber.connect();
        if (this.released) {
          this.transcriber.disconnect();
          return;
        }
        this.failedAttempts = 0;
      })
      .catch((err: unknown) => {
        this.failedAttempts++;
        logger.error('WakeWord', `${name} connection failed (${this.failedAttempts}/${this.reconnect.maxAttempts})`, err);
        if (!this.isAvailable()) {
          logger.error('WakeWord', `${name} unavailable, giving up on streaming detection`);
        }
      })
      .finally(() => {
        this.connecting = null;
      });
  }
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
