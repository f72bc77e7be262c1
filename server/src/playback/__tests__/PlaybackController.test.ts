import { describe, it, expect } from 'vitest';
import { PlaybackController } from '../PlaybackController.js';
import { FakeOutput, FakeSynthesizer, delay } from '../../__tests__/fakes.js';
import type { PlaybackOutcome } from '../../types/index.js';

function setup(chunksPerText = 3, chunkDelayMs = 1) {
  const synthesizer = new FakeSynthesizer(chunksPerText);
  const output = new FakeOutput(chunkDelayMs);
  const playback = new PlaybackController(synthesizer, output, () => 1000);
  return { synthesizer, output, playback };
}

describe('PlaybackController', () => {
  it('plays every chunk of a response', async () => {
    const { output, playback } = setup();

    const session = playback.speak('hello');

    expect(session.id).toBe('speech_1');
    expect(session.startedAt).toBe(1000);
    expect(playback.isSpeaking()).toBe(true);
    expect(await session.done).toBe('completed');
    expect(output.played).toEqual([1, 1, 1]);
    expect(playback.isSpeaking()).toBe(false);
  });

  it('cancels the previous response when speaking again', async () => {
    const { output, playback } = setup();

    const first = playback.speak('one');
    const second = playback.speak('two');

    expect(await first.done).toBe('cancelled');
    expect(await second.done).toBe('completed');
    expect(first.cancelled).toBe(true);
    expect(output.played).toEqual([2, 2, 2]);
    expect(playback.currentSession()).toBeNull();
  });

  it('reports whether a stop cancelled anything', async () => {
    const { output, playback } = setup();

    const session = playback.speak('hello');

    expect(playback.stopSpeaking()).toBe(true);
    expect(playback.stopSpeaking()).toBe(false);
    expect(await session.done).toBe('cancelled');
    expect(output.cancels).toBe(1);
  });

  it('plays nothing after a stop', async () => {
    const { output, playback } = setup(20, 3);

    const session = playback.speak('a long answer');
    await delay(10);
    playback.stopSpeaking();
    const playedAtStop = output.played.length;

    expect(await session.done).toBe('cancelled');
    expect(playedAtStop).toBeLessThan(20);
    expect(output.played).toHaveLength(playedAtStop);
  });

  it('completes empty text without synthesizing', async () => {
    const { synthesizer, playback } = setup();

    expect(await playback.speak('   ').done).toBe('completed');
    expect(synthesizer.spoken).toEqual([]);
  });

  it('ends the session when the speaker fails', async () => {
    const { output, playback } = setup();
    output.failOnChunk = 1;

    const session = playback.speak('hello');

    expect(await session.done).toBe('failed');
    expect(session.cancelled).toBe(true);
    expect(output.played).toEqual([1]);
    expect(playback.isSpeaking()).toBe(false);
  });

  it('ends the session when synthesis fails', async () => {
    const { synthesizer, output, playback } = setup();
    synthesizer.failWith = new Error('quota exceeded');

    expect(await playback.speak('hello').done).toBe('failed');
    expect(output.played).toEqual([]);
  });

  it('emits started and finished', async () => {
    const { playback } = setup();
    const events: string[] = [];
    playback.on('started', (session) => events.push(`started:${session.id}`));
    playback.on('finished', (session, outcome: PlaybackOutcome) => events.push(`finished:${session.id}:${outcome}`));

    await playback.speak('hello').done;

    expect(events).toEqual(['started:speech_1', 'finished:speech_1:completed']);
  });
});
