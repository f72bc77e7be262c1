/**
 * OpenAI text-to-speech
 * Streams raw PCM (24 kHz, 16-bit, mono) from the speech endpoint and
 * re-slices it into fixed-length chunks for playback.
 */

import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { pcmFromBytes } from '../audio/pcm.js';
import type { SpeechSynthesizer } from './SpeechProvider.js';
import type { AudioFrame } from '../types/index.js';

const OUTPUT_SAMPLE_RATE = 24000;
const CHUNK_MS = 100;

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  readonly name = 'OpenAI Speech';
  readonly sampleRate = OUTPUT_SAMPLE_RATE;

  private readonly chunkBytes = (OUTPUT_SAMPLE_RATE * CHUNK_MS / 1000) * 2;

  constructor(
    private readonly apiKey: string = ENV.OPENAI_API_KEY,
    private readonly model: string = ENV.OPENAI_TTS_MODEL,
    private readonly voice: string = ENV.OPENAI_TTS_VOICE
  ) {}

  async *synthesize(text: string, signal: AbortSignal): AsyncIterable<AudioFrame> {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }

    const response = await fetch(`${ENV.OPENAI_BASE_URL}/audio/speech`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        voice: this.voice,
        input: text,
        response_format: 'pcm',
      }),
      signal,
    });

    if (!response.ok || !response.body) {
      const errorText = await response.text();
      throw new Error(`Speech synthesis failed: ${response.status} ${errorText}`);
    }

    logger.debug('Synthesizer', `Streaming speech for: "${text}"`);

    const reader = response.body.getReader();
    let pending: Buffer = Buffer.alloc(0);

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        pending = Buffer.concat([pending, value]);

        while (pending.length >= this.chunkBytes) {
          yield pcmFromBytes(pending.subarray(0, this.chunkBytes));
          pending = pending.subarray(this.chunkBytes);
        }
      }

      if (pending.length >= 2) {
        yield pcmFromBytes(pending);
      }
    } finally {
      reader.releaseLock();
    }
  }
}
