/**
 * Speaker output via an external raw PCM player (aplay by default)
 * Writes are paced to real time so the player never holds more than about
 * one chunk; cancel() kills the player, discarding whatever it still holds.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { AudioOutputError } from '../errors.js';
import { durationMs, pcmToBuffer } from './pcm.js';
import type { AudioOutput } from './AudioDevice.js';
import type { AudioFrame } from '../types/index.js';

// Start the next write slightly before the current chunk ends to avoid gaps
const PACING = 0.9;

export class PlayerOutput implements AudioOutput {
  private player: ChildProcessWithoutNullStreams | null = null;
  private failure: Error | null = null;
  private waiters: Set<() => void> = new Set();

  constructor(
    private readonly sampleRate: number,
    private readonly command: string = ENV.PLAYER_COMMAND
  ) {}

  async playChunk(pcm: AudioFrame): Promise<void> {
    const player = this.ensurePlayer();
    player.stdin.write(pcmToBuffer(pcm));

    await this.wait(durationMs(pcm.length, this.sampleRate) * PACING);

    if (this.failure) {
      const cause = this.failure;
      this.failure = null;
      throw new AudioOutputError(`Audio player failed: ${cause.message}`, { cause });
    }
  }

  cancel(): void {
    const player = this.player;
    this.player = null;
    if (player) {
      player.kill('SIGKILL');
      logger.debug('Speaker', 'Player stopped');
    }
    this.wakeWaiters();
  }

  close(): void {
    this.cancel();
  }

  private ensurePlayer(): ChildProcessWithoutNullStreams {
    if (this.player) return this.player;

    const args = ['-q', '-t', 'raw', '-f', 'S16_LE', '-c', '1', '-r', String(this.sampleRate)];
    const child = spawn(this.command, args);
    this.player = child;
    this.failure = null;

    child.on('error', (err) => this.fail(child, err));
    child.stdin.on('error', (err) => this.fail(child, err));
    child.stderr.on('data', (data: Buffer) => {
      logger.debug('Speaker', `${this.command}: ${data.toString().trim()}`);
    });
    child.on('exit', (code, signal) => {
      if (this.player !== child) return;
      this.fail(child, new Error(`${this.command} exited (code ${code}, signal ${signal})`));
    });

    logger.debug('Speaker', `Spawned ${this.command}`, { sampleRate: this.sampleRate });
    return child;
  }

  private fail(child: ChildProcessWithoutNullStreams, err: Error): void {
    if (this.player !== child) return;
    logger.error('Speaker', 'Audio player failed', err);
    this.failure = err;
    this.player = null;
    child.kill('SIGKILL');
    this.wakeWaiters();
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.waiters.add(done);
    });
  }

  private wakeWaiters(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}
