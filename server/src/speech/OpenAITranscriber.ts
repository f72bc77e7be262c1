/**
 * OpenAI transcription
 * Uploads a captured speech window as WAV to the audio transcription endpoint
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { encodeWav } from '../audio/pcm.js';
import type { SpeechToText, TranscribeOptions } from './SpeechProvider.js';
import type { AudioFrame } from '../types/index.js';

const transcriptionSchema = z.object({
  text: z.string().optional(),
});

export class OpenAITranscriber implements SpeechToText {
  readonly name = 'OpenAI Transcription';

  constructor(
    private readonly apiKey: string = ENV.OPENAI_API_KEY,
    private readonly model: string = ENV.OPENAI_TRANSCRIBE_MODEL,
    private readonly language: string = ENV.SPEECH_LANGUAGE
  ) {}

  async transcribe(pcm: AudioFrame, options: TranscribeOptions): Promise<string> {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }

    const wav = encodeWav(pcm, options.sampleRate);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'speech.wav');
    form.append('model', this.model);
    form.append('language', this.language);

    const response = await fetch(`${ENV.OPENAI_BASE_URL}/audio/transcriptions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: form,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Transcription failed: ${response.status} ${errorText}`);
    }

    const data = transcriptionSchema.parse(await response.json());
    const text = data.text?.trim() ?? '';
    logger.debug('Transcriber', `Recognized: "${text}"`);
    return text;
  }
}
