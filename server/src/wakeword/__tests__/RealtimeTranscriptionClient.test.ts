import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import { WebSocketServer, type WebSocket } from 'ws';
import { z } from 'zod';
import { RealtimeTranscriptionClient } from '../RealtimeTranscriptionClient.js';
import { WakeWordBackendError } from '../../errors.js';
import { delay } from '../../__tests__/fakes.js';

const clientEventSchema = z.object({
  type: z.string(),
  event_id: z.string(),
  audio: z.string().optional(),
  session: z.unknown().optional(),
});

type ClientEvent = z.infer<typeof clientEventSchema>;

async function waitFor(check: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !check(); i++) {
    await delay(5);
  }
}

describe('RealtimeTranscriptionClient', () => {
  let server: WebSocketServer;
  let url: string;
  let socket: WebSocket | null;
  let received: ClientEvent[];
  let headers: Record<string, string | string[] | undefined>;

  beforeEach(async () => {
    received = [];
    socket = null;
    server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    server.on('connection', (ws, req) => {
      socket = ws;
      headers = req.headers;
      ws.on('message', (data) => received.push(clientEventSchema.parse(JSON.parse(data.toString()))));
      ws.send(JSON.stringify({ type: 'transcription_session.created', session: { id: 'sess_test' } }));
    });
    await once(server, 'listening');
    const address = server.address();
    if (typeof address === 'string') throw new Error('Expected a TCP address');
    url = `ws://127.0.0.1:${address.port}/v1/realtime`;
  });

  afterEach(() => {
    server.close();
  });

  it('requires an API key', () => {
    expect(() => new RealtimeTranscriptionClient('')).toThrow(WakeWordBackendError);
  });

  it('opens a transcription session', async () => {
    const client = new RealtimeTranscriptionClient('test-secret', 'test-transcribe', 'en', url);

    await client.connect();
    await waitFor(() => received.length >= 1);

    expect(client.isConnected()).toBe(true);
    expect(headers.authorization).toBe('Bearer test-secret');
    expect(received[0]).toMatchObject({
      type: 'transcription_session.update',
      session: {
        input_audio_format: 'pcm16',
        input_audio_transcription: { model: 'test-transcribe', language: 'en' },
      },
    });
    client.disconnect();
  });

  it('streams audio resampled to 24 kHz', async () => {
    const client = new RealtimeTranscriptionClient('test-secret', 'test-transcribe', 'en', url);
    await client.connect();

    client.sendAudio(new Int16Array(160), 16000);
    await waitFor(() => received.length >= 2);

    expect(received[1].type).toBe('input_audio_buffer.append');
    // 240 samples -> 480 bytes -> 640 base64 characters
    expect(received[1].audio).toHaveLength(640);
    client.disconnect();
  });

  it('emits completed transcripts', async () => {
    const client = new RealtimeTranscriptionClient('test-secret', 'test-transcribe', 'en', url);
    const transcripts: string[] = [];
    client.onTranscript((text) => transcripts.push(text));
    await client.connect();

    socket?.send(JSON.stringify({
      type: 'conversation.item.input_audio_transcription.completed',
      transcript: 'hey glasses',
    }));
    await waitFor(() => transcripts.length > 0);

    expect(transcripts).toEqual(['hey glasses']);
    client.disconnect();
    expect(client.isConnected()).toBe(false);
  });

  it('drops audio before a session exists', () => {
    const client = new RealtimeTranscriptionClient('test-secret', 'test-transcribe', 'en', url);

    client.sendAudio(new Int16Array(160), 16000);

    expect(received).toEqual([]);
  });
});
