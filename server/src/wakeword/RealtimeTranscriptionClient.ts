/**
 * OpenAI Realtime transcription client
 * Streams microphone audio over a WebSocket transcription session and
 * emits each completed input transcript.
 *
 * API Reference: https://platform.openai.com/docs/guides/realtime-transcription
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { WakeWordBackendError } from '../errors.js';
import { pcmToBuffer, resample } from '../audio/pcm.js';
import type { StreamingTranscriber } from './TranscriptStrategy.js';
import type { AudioFrame } from '../types/index.js';

// The realtime API only takes 24 kHz pcm16
const REALTIME_SAMPLE_RATE = 24000;
const CONNECT_TIMEOUT_MS = 10000;

function generateId(prefix: string = 'evt'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

interface RealtimeEvent {
  type: string;
  event_id?: string;
  [key: string]: unknown;
}

function isRealtimeEvent(value: unknown): value is RealtimeEvent {
  return typeof value === 'object' && value !== null &&
    'type' in value && typeof value.type === 'string';
}

function describeError(event: RealtimeEvent): string {
  const error = event.error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'unknown error';
}

export class RealtimeTranscriptionClient extends EventEmitter implements StreamingTranscriber {
  readonly name = 'OpenAI Realtime Transcription';

  private ws: WebSocket | null = null;
  private sessionId: string | null = null;

  constructor(
    private readonly apiKey: string = ENV.OPENAI_API_KEY,
    private readonly model: string = ENV.OPENAI_TRANSCRIBE_MODEL,
    private readonly language: string = ENV.SPEECH_LANGUAGE,
    private readonly url: string = ENV.OPENAI_REALTIME_URL
  ) {
    super();
    if (!apiKey) {
      throw new WakeWordBackendError('OPENAI_API_KEY not configured');
    }
  }

  async connect(): Promise<void> {
    if (this.ws?.readyState === WebSocket.OPEN) {
      logger.warn('RealtimeClient', 'Already connected');
      return;
    }

    const url = `${this.url}?intent=transcription`;
    logger.info('RealtimeClient', `Connecting to ${url}`);

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'OpenAI-Beta': 'realtime=v1',
        },
      });
      this.ws = ws;

      const timeout = setTimeout(() => {
        ws.close();
        reject(new Error('Connection timeout'));
      }, CONNECT_TIMEOUT_MS);

      ws.on('open', () => {
        clearTimeout(timeout);
        logger.info('RealtimeClient', 'WebSocket connected');
        this.configureSession();
      });

      ws.on('message', (data) => {
        let event: unknown;
        try {
          event = JSON.parse(data.toString());
        } catch (err) {
          logger.error('RealtimeClient', 'Failed to parse message', err);
          return;
        }
        if (!isRealtimeEvent(event)) return;

        this.handleEvent(event);
        if (event.type === 'transcription_session.created' || event.type === 'session.created') {
          resolve();
        }
      });

      ws.on('error', (err) => {
        clearTimeout(timeout);
        logger.error('RealtimeClient', 'WebSocket error', err);
        reject(err);
      });

      ws.on('close', (code, reason) => {
        clearTimeout(timeout);
        logger.info('RealtimeClient', `WebSocket closed: ${code} ${reason.toString()}`);
        this.sessionId = null;
        if (this.ws === ws) this.ws = null;
      });
    });
  }

  disconnect(): void {
    if (this.ws) {
      this.ws.close();
      this.ws = null;
      this.sessionId = null;
      logger.info('RealtimeClient', 'Disconnected');
    }
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN && this.sessionId !== null;
  }

  sendAudio(pcm: AudioFrame, sampleRate: number): void {
    // Frames arriving before the session is up are dropped
    if (!this.isConnected()) return;
    const audio = pcmToBuffer(resample(pcm, sampleRate, REALTIME_SAMPLE_RATE)).toString('base64');
    this.send({ type: 'input_audio_buffer.append', audio }, false);
  }

  onTranscript(handler: (text: string) => void): void {
    this.on('transcript', handler);
  }

  private send(event: RealtimeEvent, verbose: boolean = true): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      logger.warn('RealtimeClient', 'Cannot send - not connected');
      return;
    }

    const eventWithId = {
      ...event,
      event_id: event.event_id || generateId('evt'),
    };

    if (verbose) {
      logger.debug('RealtimeClient', `>>> ${event.type}`, { event_id: eventWithId.event_id });
    }
    this.ws.send(JSON.stringify(eventWithId));
  }

  private configureSession(): void {
    this.send({
      type: 'transcription_session.update',
      session: {
        input_audio_format: 'pcm16',
        input_audio_transcription: {
          model: this.model,
          language: this.language,
        },
        turn_detection: {
          type: 'server_vad',
          threshold: 0.5,
          prefix_padding_ms: 300,
          silence_duration_ms: 500,
        },
      },
    });
  }

  private handleEvent(event: RealtimeEvent): void {
    switch (event.type) {
      case 'transcription_session.created':
      case 'session.created': {
        const session = event.session;
        this.sessionId = typeof session === 'object' && session !== null && 'id' in session && typeof session.id === 'string'
          ? session.id
          : generateId('session');
        logger.info('RealtimeClient', `Session created: ${this.sessionId}`);
        break;
      }

      case 'transcription_session.updated':
        logger.debug('RealtimeClient', 'Session updated');
        break;

      case 'conversation.item.input_audio_transcription.completed': {
        if (typeof event.transcript !== 'string') break;
        logger.debug('RealtimeClient', `Heard: "${event.transcript}"`);
        this.emit('transcript', event.transcript);
        break;
      }

      case 'error':
        logger.error('RealtimeClient', `API Error: ${describeError(event)}`, event.error);
        break;

      default:
        logger.debug('RealtimeClient', `<<< ${event.type}`);
    }
  }
}
