/**
 * Special Commands
 * Phrases handled on the device itself instead of going to the assistant:
 * sleep phrases, camera capture and shutdown.
 */

import { logger } from '../utils/logger.js';
import type { Camera } from '../camera/Camera.js';

export type SpecialCommand = 'photo' | 'video' | 'shutdown';

export const SLEEP_PHRASES = ['go to sleep', 'stop listening', 'goodbye', 'sleep mode', "that's all"];

const COMMAND_PHRASES: Record<SpecialCommand, string[]> = {
  photo: ['take a photo', 'take photo', 'take a picture'],
  video: ['record video', 'record a video', 'start recording'],
  shutdown: ['shutdown', 'shut down', 'turn off'],
};

export function isSleepPhrase(text: string): boolean {
  const lower = text.toLowerCase();
  return SLEEP_PHRASES.some((phrase) => lower.includes(phrase));
}

export function matchSpecialCommand(text: string): SpecialCommand | null {
  const lower = text.toLowerCase();
  for (const command of ['photo', 'video', 'shutdown'] as const) {
    if (COMMAND_PHRASES[command].some((phrase) => lower.includes(phrase))) {
      return command;
    }
  }
  return null;
}

export interface CommandContext {
  camera: Camera;
  videoDurationSeconds: number;
  /** Speak and wait until finished */
  say(text: string): Promise<void>;
  shutdown(): void;
  turnId?: string;
}

export async function runSpecialCommand(command: SpecialCommand, ctx: CommandContext): Promise<void> {
  logger.info('Commands', `Special command: ${command}`, undefined, ctx.turnId);

  switch (command) {
    case 'photo':
      await ctx.say('Taking photo');
      try {
        await ctx.camera.takePhoto();
        await ctx.say('Photo saved');
      } catch (err) {
        logger.error('Commands', 'Photo capture failed', err, ctx.turnId);
        await ctx.say("Sorry, I couldn't take a photo.");
      }
      break;

    case 'video':
      await ctx.say('Recording video');
      try {
        await ctx.camera.recordVideo(ctx.videoDurationSeconds);
        await ctx.say('Video saved');
      } catch (err) {
        logger.error('Commands', 'Video recording failed', err, ctx.turnId);
        await ctx.say("Sorry, I couldn't record a video.");
      }
      break;

    case 'shutdown':
      await ctx.say('Shutting down');
      ctx.shutdown();
      break;
  }
}
