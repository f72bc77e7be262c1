/**
 * Microphone input backed by PvRecorder
 * Reads fixed-length frames from the recorder and re-slices them to
 * whatever frame size the current consumer asks for.
 */

import { PvRecorder } from '@picovoice/pvrecorder-node';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { MicrophoneUnavailableError } from '../errors.js';
import { concatFrames } from './pcm.js';
import type { AudioInput } from './AudioDevice.js';
import type { AudioFrame } from '../types/index.js';

// PvRecorder always records 16 kHz mono
const RECORDER_SAMPLE_RATE = 16000;

export class PvRecorderInput implements AudioInput {
  private recorder: PvRecorder | null = null;
  private pendingRead: Promise<Int16Array> | null = null;
  private buffered: AudioFrame = new Int16Array(0);

  constructor(
    private readonly frameLength: number,
    private readonly deviceIndex: number = ENV.MIC_DEVICE_INDEX
  ) {}

  get sampleRate(): number {
    return this.recorder?.sampleRate ?? RECORDER_SAMPLE_RATE;
  }

  async open(): Promise<void> {
    if (this.recorder) return;

    try {
      const recorder = new PvRecorder(this.frameLength, this.deviceIndex);
      recorder.start();
      this.recorder = recorder;
      logger.info('Microphone', `Recording from: ${recorder.getSelectedDevice()}`, {
        sampleRate: recorder.sampleRate,
        frameLength: this.frameLength,
      });
    } catch (err) {
      throw new MicrophoneUnavailableError(`Failed to open microphone (device ${this.deviceIndex})`, { cause: err });
    }
  }

  async readFrame(size: number, timeoutMs: number): Promise<AudioFrame | null> {
    const recorder = this.recorder;
    if (!recorder) {
      throw new MicrophoneUnavailableError('Microphone is not open');
    }

    while (this.buffered.length < size) {
      const chunk = await this.nextChunk(recorder, timeoutMs);
      if (!chunk) return null;
      this.buffered = concatFrames([this.buffered, chunk]);
    }

    const frame = this.buffered.slice(0, size);
    this.buffered = this.buffered.slice(size);
    return frame;
  }

  close(): void {
    if (!this.recorder) return;
    this.recorder.stop();
    this.recorder.release();
    this.recorder = null;
    this.pendingRead = null;
    this.buffered = new Int16Array(0);
    logger.info('Microphone', 'Microphone released');
  }

  /**
   * A read that outlives its timeout is kept and picked up by the next call,
   * so no recorded audio is dropped between consumers.
   */
  private async nextChunk(recorder: PvRecorder, timeoutMs: number): Promise<AudioFrame | null> {
    if (!this.pendingRead) {
      const read = recorder.read();
      read.catch((err: unknown) => logger.debug('Microphone', 'Pending read failed', err));
      this.pendingRead = read;
    }
    const pending = this.pendingRead;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const result = await Promise.race([pending, timeout]);
      if (result !== null) {
        this.pendingRead = null;
      }
      return result;
    } catch (err) {
      this.pendingRead = null;
      throw new MicrophoneUnavailableError('Microphone read failed', { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
