/**
 * Voice Settings
 * Immutable snapshot of the settings the voice engine is built from.
 * Updates never mutate a snapshot; they produce a new one.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { SettingsValidationError } from '../errors.js';
import type { DetectorConfig, WakeWordMethod } from '../types/index.js';

export interface VoiceSettings {
  readonly wakeword: {
    readonly method: WakeWordMethod;
    readonly keyword: string;
    readonly sensitivity: number;
  };
  readonly activity: {
    readonly sleepTimeoutSeconds: number;
  };
  readonly audio: {
    readonly sampleRate: number;
    readonly frameSize: number;
  };
}

export const WAKEWORD_METHODS = ['model', 'streaming', 'energy'] as const;

export const DEFAULT_SETTINGS: VoiceSettings = freezeSettings({
  wakeword: { method: 'model', keyword: 'hey glasses', sensitivity: 0.5 },
  activity: { sleepTimeoutSeconds: 60 },
  audio: { sampleRate: 16000, frameSize: 512 },
});

const settingsPatchSchema = z.object({
  wakeword: z.object({
    method: z.enum(WAKEWORD_METHODS),
    keyword: z.string().trim().min(1),
    sensitivity: z.number().min(0).max(1),
  }).partial().optional(),
  activity: z.object({
    sleepTimeoutSeconds: z.number().positive().max(3600),
  }).partial().optional(),
  audio: z.object({
    sampleRate: z.number().int().min(8000).max(48000),
    frameSize: z.number().int().min(64).max(8192),
  }).partial().optional(),
});

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWakeWordMethod(value: string): value is WakeWordMethod {
  return WAKEWORD_METHODS.some((method) => method === value);
}

export function freezeSettings(settings: VoiceSettings): VoiceSettings {
  return Object.freeze({
    wakeword: Object.freeze({ ...settings.wakeword }),
    activity: Object.freeze({ ...settings.activity }),
    audio: Object.freeze({ ...settings.audio }),
  });
}

/**
 * Turns `{ 'wakeword.keyword': 'x' }` into `{ wakeword: { keyword: 'x' } }`.
 * Nested sections are merged with dotted keys for the same section.
 */
export function expandDottedKeys(input: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (key.includes('.')) {
      const parts = key.split('.');
      if (parts.length !== 2) continue;
      const [section, field] = parts;
      const existing = result[section];
      result[section] = { ...(isRecord(existing) ? existing : {}), [field]: value };
    } else if (isRecord(value)) {
      const existing = result[key];
      result[key] = { ...(isRecord(existing) ? existing : {}), ...value };
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Apply a settings update. Unknown keys are ignored; invalid values throw.
 */
export function applySettingsUpdate(current: VoiceSettings, patch: unknown): VoiceSettings {
  if (!isRecord(patch)) {
    throw new SettingsValidationError('Settings update must be an object');
  }

  const parsed = settingsPatchSchema.safeParse(expandDottedKeys(patch));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new SettingsValidationError('Invalid settings update', issues);
  }

  const update = parsed.data;
  return freezeSettings({
    wakeword: { ...current.wakeword, ...update.wakeword },
    activity: { ...current.activity, ...update.activity },
    audio: { ...current.audio, ...update.audio },
  });
}

function parseNumber(raw: string | undefined, fallback: number, valid: (n: number) => boolean): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && valid(value) ? value : fallback;
}

/**
 * Build settings from environment variables, falling back to defaults
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): VoiceSettings {
  const defaults = DEFAULT_SETTINGS;

  let method = defaults.wakeword.method;
  const rawMethod = env.WAKEWORD_METHOD?.trim().toLowerCase();
  if (rawMethod) {
    if (isWakeWordMethod(rawMethod)) {
      method = rawMethod;
    } else {
      logger.warn('Settings', `Unknown wake word method '${rawMethod}', falling back to energy detection`);
      method = 'energy';
    }
  }

  const sensitivity = parseNumber(env.WAKEWORD_SENSITIVITY, defaults.wakeword.sensitivity, () => true);

  return freezeSettings({
    wakeword: {
      method,
      keyword: env.WAKEWORD_KEYWORD?.trim() || defaults.wakeword.keyword,
      sensitivity: Math.max(0, Math.min(1, sensitivity)),
    },
    activity: {
      sleepTimeoutSeconds: parseNumber(env.SLEEP_TIMEOUT_SECONDS, defaults.activity.sleepTimeoutSeconds, n => n > 0),
    },
    audio: {
      sampleRate: parseNumber(env.AUDIO_SAMPLE_RATE, defaults.audio.sampleRate, n => Number.isInteger(n) && n > 0),
      frameSize: parseNumber(env.AUDIO_FRAME_SIZE, defaults.audio.frameSize, n => Number.isInteger(n) && n > 0),
    },
  });
}

/**
 * Detector config for `settings`. `inputSampleRate` is the rate the
 * microphone actually delivers and wins over the configured one.
 */
export function detectorConfigFrom(settings: VoiceSettings, inputSampleRate?: number): DetectorConfig {
  return {
    method: settings.wakeword.method,
    keyword: settings.wakeword.keyword,
    sensitivity: settings.wakeword.sensitivity,
    sampleRate: inputSampleRate ?? settings.audio.sampleRate,
    frameSize: settings.audio.frameSize,
  };
}

/** True when the wake word engine must be rebuilt to honour `next` */
export function detectorChanged(prev: VoiceSettings, next: VoiceSettings): boolean {
  const a = detectorConfigFrom(prev);
  const b = detectorConfigFrom(next);
  return a.method !== b.method ||
    a.keyword !== b.keyword ||
    a.sensitivity !== b.sensitivity ||
    a.sampleRate !== b.sampleRate ||
    a.frameSize !== b.frameSize;
}
