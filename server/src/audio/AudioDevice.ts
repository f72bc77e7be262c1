/**
 * Audio Device Interfaces
 * The microphone and speaker primitives beneath the voice engine
 */

import type { AudioFrame } from '../types/index.js';

export interface AudioInput {
  /**
   * Open the microphone. Rejects with MicrophoneUnavailableError when it cannot be opened.
   */
  open(): Promise<void>;

  /**
   * Read exactly `size` samples, or null if none arrived within `timeoutMs`
   */
  readFrame(size: number, timeoutMs: number): Promise<AudioFrame | null>;

  /**
   * Release the microphone
   */
  close(): void;

  /**
   * Sample rate of the frames this input produces
   */
  readonly sampleRate: number;
}

export interface AudioOutput {
  /**
   * Render one chunk. Resolves roughly when the chunk has been heard,
   * or immediately after cancel().
   */
  playChunk(pcm: AudioFrame): Promise<void>;

  /**
   * Stop rendering and discard anything already queued
   */
  cancel(): void;

  /**
   * Release the output device
   */
  close(): void;
}
