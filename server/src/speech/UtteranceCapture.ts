/**
 * Utterance Capture
 * Waits a bounded time for speech onset, records until trailing silence
 * or the phrase limit, then hands the window to speech-to-text.
 * Time is counted in audio received, so a listen never outlives its budget
 * by more than one read timeout.
 */

import { logger } from '../utils/logger.js';
import { concatFrames, durationMs, rms } from '../audio/pcm.js';
import type { AudioInput } from '../audio/AudioDevice.js';
import type { SpeechToText } from './SpeechProvider.js';
import type { AudioFrame } from '../types/index.js';

export interface Listener {
  /**
   * Listen for one utterance. Resolves '' on silence or a failed transcription.
   * Aborting stops the wait for speech onset; speech already being recorded
   * is finished and transcribed.
   */
  listen(timeoutMs: number, signal?: AbortSignal): Promise<string>;
}

export interface UtteranceCaptureOptions {
  frameSize: number;
  energyThreshold: number;
  silenceMs: number;
  phraseLimitMs: number;
  readTimeoutMs: number;
  transcribeTimeoutMs: number;
  prerollFrames?: number;
}

export class UtteranceCapture implements Listener {
  private readonly prerollFrames: number;

  constructor(
    private readonly input: AudioInput,
    private readonly stt: SpeechToText,
    private readonly options: UtteranceCaptureOptions
  ) {
    this.prerollFrames = options.prerollFrames ?? 3;
  }

  async listen(timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const speech = await this.record(timeoutMs, signal);
    if (!speech) return '';

    try {
      const text = await this.stt.transcribe(speech, {
        sampleRate: this.input.sampleRate,
        timeoutMs: this.options.transcribeTimeoutMs,
      });
      return text.trim();
    } catch (err) {
      logger.warn('Capture', `${this.stt.name} failed`, err);
      return '';
    }
  }

  private async record(timeoutMs: number, signal?: AbortSignal): Promise<AudioFrame | null> {
    const { frameSize, energyThreshold, silenceMs, phraseLimitMs, readTimeoutMs } = this.options;
    const frameMs = durationMs(frameSize, this.input.sampleRate);

    const preroll: AudioFrame[] = [];
    const frames: AudioFrame[] = [];
    let speaking = false;
    let waitedMs = 0;
    let speechMs = 0;
    let silentMs = 0;

    for (;;) {
      if (signal?.aborted && !speaking) return null;
      const frame = await this.input.readFrame(frameSize, readTimeoutMs);

      if (!frame) {
        if (speaking) break; // input dried up mid-phrase: keep what we have
        waitedMs += readTimeoutMs;
        if (waitedMs >= timeoutMs) return null;
        continue;
      }

      const loud = rms(frame) > energyThreshold;

      if (!speaking) {
        if (loud) {
          speaking = true;
          frames.push(...preroll, frame);
          speechMs = frameMs;
          logger.debug('Capture', 'Speech started');
          continue;
        }
        preroll.push(frame);
        if (preroll.length > this.prerollFrames) preroll.shift();
        waitedMs += frameMs;
        if (waitedMs >= timeoutMs) return null;
        continue;
      }

      frames.push(frame);
      speechMs += frameMs;
      silentMs = loud ? 0 : silentMs + frameMs;
      if (silentMs >= silenceMs || speechMs >= phraseLimitMs) break;
    }

    if (frames.length === 0) return null;
    logger.debug('Capture', `Captured ${Math.round(speechMs)}ms of speech`);
    return concatFrames(frames);
  }
}
