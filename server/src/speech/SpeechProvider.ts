/**
 * Speech Provider Interfaces
 * Speech-to-text and text-to-speech backends used by capture and playback
 */

import type { AudioFrame } from '../types/index.js';

export interface TranscribeOptions {
  sampleRate: number;
  timeoutMs: number;
}

export interface SpeechToText {
  /**
   * Provider name for logging
   */
  readonly name: string;

  /**
   * Transcribe a window of audio. Resolves '' when nothing was recognized.
   */
  transcribe(pcm: AudioFrame, options: TranscribeOptions): Promise<string>;
}

export interface SpeechSynthesizer {
  /**
   * Provider name for logging
   */
  readonly name: string;

  /**
   * Sample rate of the chunks this synthesizer yields
   */
  readonly sampleRate: number;

  /**
   * Synthesize `text` as a sequence of PCM chunks. Chunk boundaries are
   * where playback checks for cancellation.
   */
  synthesize(text: string, signal: AbortSignal): AsyncIterable<AudioFrame>;
}
