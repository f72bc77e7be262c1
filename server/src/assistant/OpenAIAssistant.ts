/**
 * OpenAI chat assistant
 * Keeps a short rolling conversation history and a personality-specific
 * system prompt. Replies are meant to be spoken, so they are kept brief.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { APOLOGY, type Assistant } from './Assistant.js';

export const NOT_CONFIGURED = "Sorry, I'm not properly configured. Please check the API key.";
export const MAX_HISTORY = 20;

interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface Personality {
  tone: string;
  traits: string;
}

export const PERSONALITIES: Record<string, Personality> = {
  friendly: {
    tone: 'warm, friendly and conversational',
    traits: 'You are upbeat and supportive, use casual language and the odd bit of light humor.',
  },
  professional: {
    tone: 'clear, precise and efficient',
    traits: 'You are courteous and formal and get to the point quickly.',
  },
  witty: {
    tone: 'clever and playful',
    traits: 'You enjoy wordplay and keep things light while still answering the question.',
  },
  jarvis: {
    tone: 'refined, British and dryly humorous',
    traits: 'You are loyal and helpful with a hint of sarcasm, and address the user as "sir".',
  },
  casual: {
    tone: 'relaxed and laid-back',
    traits: 'You talk like a helpful friend and keep it simple.',
  },
};

export function buildSystemPrompt(name: string, personality: string): string {
  const style = PERSONALITIES[personality] ?? PERSONALITIES.friendly;
  return [
    `You are ${name}, a voice assistant built into smart glasses worn by the user.`,
    '',
    `Tone: ${style.tone}.`,
    style.traits,
    '',
    'Your replies are spoken aloud:',
    '- Keep them to one to three short sentences.',
    '- Speak naturally, no markdown, lists or emoji.',
    '- If you cannot do something, say so briefly.',
    '- Offer to continue when a full answer would be long.',
  ].join('\n');
}

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })).min(1),
});

export interface OpenAIAssistantOptions {
  apiKey: string;
  model: string;
  name: string;
  personality: string;
  timeoutMs: number;
}

export class OpenAIAssistant implements Assistant {
  readonly name = 'OpenAI Chat';
  readonly systemPrompt: string;

  private readonly options: OpenAIAssistantOptions;
  private history: ChatMessage[] = [];

  constructor(options: Partial<OpenAIAssistantOptions> = {}) {
    this.options = {
      apiKey: options.apiKey ?? ENV.OPENAI_API_KEY,
      model: options.model ?? ENV.OPENAI_CHAT_MODEL,
      name: options.name ?? ENV.ASSISTANT_NAME,
      personality: options.personality ?? ENV.ASSISTANT_PERSONALITY,
      timeoutMs: options.timeoutMs ?? ENV.ASSISTANT_TIMEOUT_MS,
    };
    this.systemPrompt = buildSystemPrompt(this.options.name, this.options.personality);
  }

  async process(text: string, turnId?: string): Promise<string> {
    if (!this.options.apiKey) {
      logger.warn('Assistant', 'OPENAI_API_KEY not configured', undefined, turnId);
      return NOT_CONFIGURED;
    }

    try {
      const reply = await this.complete(text);
      this.remember({ role: 'user', content: text }, { role: 'assistant', content: reply });
      logger.info('Assistant', `Reply: "${reply}"`, undefined, turnId);
      return reply;
    } catch (err) {
      logger.error('Assistant', 'Failed to process request', err, turnId);
      return APOLOGY;
    }
  }

  getHistory(): ReadonlyArray<Readonly<ChatMessage>> {
    return this.history;
  }

  private async complete(text: string): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...this.history,
      { role: 'user', content: text },
    ];

    const response = await fetch(`${ENV.OPENAI_BASE_URL}/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.options.model,
        messages,
        max_tokens: 150,
        temperature: 0.7,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Chat completion failed: ${response.status} ${errorText}`);
    }

    const body = chatCompletionSchema.parse(await response.json());
    const reply = body.choices[0].message.content?.trim();
    if (!reply) {
      throw new Error('Chat completion returned an empty message');
    }
    return reply;
  }

  private remember(...messages: ChatMessage[]): void {
    this.history.push(...messages);
    if (this.history.length > MAX_HISTORY) {
      this.history = this.history.slice(-MAX_HISTORY);
    }
  }
}
