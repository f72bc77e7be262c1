/**
 * Camera backed by the rpicam command line tools
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import type { Camera } from './Camera.js';

const run = promisify(execFile);

/** `20240131_094502` */
export function captureTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export class CommandLineCamera implements Camera {
  constructor(
    private readonly photosDir: string = ENV.PHOTOS_DIR,
    private readonly videosDir: string = ENV.VIDEOS_DIR,
    private readonly stillCommand: string = 'rpicam-still',
    private readonly videoCommand: string = 'rpicam-vid',
    private readonly now: () => Date = () => new Date()
  ) {}

  async takePhoto(): Promise<string> {
    await mkdir(this.photosDir, { recursive: true });
    const filepath = join(this.photosDir, `photo_${captureTimestamp(this.now())}.jpg`);

    logger.info('Camera', `Taking photo: ${filepath}`);
    await run(this.stillCommand, ['-n', '-t', '1000', '-o', filepath]);
    logger.info('Camera', `Photo saved: ${filepath}`);
    return filepath;
  }

  async recordVideo(durationSeconds: number): Promise<string> {
    await mkdir(this.videosDir, { recursive: true });
    const filepath = join(this.videosDir, `video_${captureTimestamp(this.now())}.h264`);

    logger.info('Camera', `Recording video: ${filepath} (duration: ${durationSeconds}s)`);
    await run(this.videoCommand, ['-n', '-t', String(durationSeconds * 1000), '-o', filepath]);
    logger.info('Camera', `Video saved: ${filepath}`);
    return filepath;
  }
}
