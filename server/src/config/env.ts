/**
 * Smart Glasses Configuration
 * Load from environment variables with defaults
 */
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Nearest directory with a package.json, from both sources and dist/
function findProjectRoot(start: string): string {
  let dir = start;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
  return dir;
}

export const PROJECT_ROOT = findProjectRoot(__dirname);

// Load .env from project root
config({ path: resolve(PROJECT_ROOT, '.env') });

export const ENV = {
  // OpenAI (assistant, transcription, speech, streaming wake word)
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
  OPENAI_CHAT_MODEL: process.env.OPENAI_CHAT_MODEL || 'gpt-4o-mini',
  OPENAI_TRANSCRIBE_MODEL: process.env.OPENAI_TRANSCRIBE_MODEL || 'whisper-1',
  OPENAI_TTS_MODEL: process.env.OPENAI_TTS_MODEL || 'tts-1',
  OPENAI_TTS_VOICE: process.env.OPENAI_TTS_VOICE || 'alloy',
  OPENAI_REALTIME_URL: process.env.OPENAI_REALTIME_URL || 'wss://api.openai.com/v1/realtime',

  // Picovoice
  PORCUPINE_ACCESS_KEY: process.env.PORCUPINE_ACCESS_KEY || '',

  // Audio devices
  MIC_DEVICE_INDEX: parseInt(process.env.MIC_DEVICE_INDEX || '-1', 10),
  PLAYER_COMMAND: process.env.PLAYER_COMMAND || 'aplay',
  SPEECH_LANGUAGE: process.env.SPEECH_LANGUAGE || 'en',

  // Listening
  SPEECH_ENERGY_THRESHOLD: parseInt(process.env.SPEECH_ENERGY_THRESHOLD || '1000', 10),
  SILENCE_DURATION_MS: parseInt(process.env.SILENCE_DURATION_MS || '800', 10),
  PHRASE_TIME_LIMIT_MS: parseInt(process.env.PHRASE_TIME_LIMIT_MS || '10000', 10), // 10s
  CAPTURE_TIMEOUT_MS: parseInt(process.env.CAPTURE_TIMEOUT_MS || '5000', 10), // 5s
  INTERRUPT_LISTEN_TIMEOUT_MS: parseInt(process.env.INTERRUPT_LISTEN_TIMEOUT_MS || '3000', 10),
  TRANSCRIBE_TIMEOUT_MS: parseInt(process.env.TRANSCRIBE_TIMEOUT_MS || '8000', 10),
  FRAME_READ_TIMEOUT_MS: parseInt(process.env.FRAME_READ_TIMEOUT_MS || '1000', 10),
  WAKE_REFRACTORY_MS: parseInt(process.env.WAKE_REFRACTORY_MS || '1500', 10),

  // Assistant
  ASSISTANT_NAME: process.env.ASSISTANT_NAME || 'Assistant',
  ASSISTANT_PERSONALITY: process.env.ASSISTANT_PERSONALITY || 'friendly',
  ASSISTANT_TIMEOUT_MS: parseInt(process.env.ASSISTANT_TIMEOUT_MS || '20000', 10),

  // Camera
  PHOTOS_DIR: process.env.PHOTOS_DIR || resolve(PROJECT_ROOT, 'photos'),
  VIDEOS_DIR: process.env.VIDEOS_DIR || resolve(PROJECT_ROOT, 'videos'),
  VIDEO_DURATION_SECONDS: parseInt(process.env.VIDEO_DURATION_SECONDS || '10', 10),

  // Server
  SERVER_PORT: parseInt(process.env.SERVER_PORT || '5000', 10),
  API_KEY: process.env.API_KEY || '',

  // Logging
  LOG_TO_FILE: process.env.LOG_TO_FILE !== 'false',
  DEBUG: process.env.DEBUG === 'true',
};

export function validateConfig(): void {
  if (!ENV.OPENAI_API_KEY) {
    console.warn('[Config] WARNING: OPENAI_API_KEY not set. Assistant, transcription and speech will not work.');
  }
  if (!ENV.PORCUPINE_ACCESS_KEY) {
    console.warn('[Config] WARNING: PORCUPINE_ACCESS_KEY not set. Wake word model unavailable.');
  }
  if (!ENV.API_KEY) {
    console.warn('[Config] WARNING: API_KEY not set. HTTP API is unauthenticated.');
  }
}
