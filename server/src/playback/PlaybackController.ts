/**
 * Playback Controller
 * Sole writer to the speaker. Each spoken response is a PlaybackSession
 * rendered by its own worker; a session owns an AbortController and the
 * worker checks it at every chunk boundary.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import type { AudioOutput } from '../audio/AudioDevice.js';
import type { SpeechSynthesizer } from '../speech/SpeechProvider.js';
import type { PlaybackOutcome, PlaybackSession } from '../types/index.js';

export interface PlaybackControllerEvents {
  started: (session: PlaybackSession) => void;
  finished: (session: PlaybackSession, outcome: PlaybackOutcome) => void;
}

class ActiveSession implements PlaybackSession {
  readonly controller = new AbortController();
  done: Promise<PlaybackOutcome> = Promise.resolve('completed');

  constructor(
    readonly id: string,
    readonly text: string,
    readonly startedAt: number
  ) {}

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }
}

export class PlaybackController extends EventEmitter {
  private current: ActiveSession | null = null;
  private sessionCount = 0;

  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly output: AudioOutput,
    private readonly now: () => number = Date.now
  ) {
    super();
  }

  /**
   * Start speaking `text` and return without waiting for it to finish.
   * Any session still alive is cancelled first.
   */
  speak(text: string): PlaybackSession {
    this.stopSpeaking();

    const session = new ActiveSession(`speech_${++this.sessionCount}`, text, this.now());
    this.current = session;
    this.emit('started', session);

    session.done = this.render(session).then((outcome) => {
      if (this.current === session) this.current = null;
      this.emit('finished', session, outcome);
      return outcome;
    });

    return session;
  }

  /**
   * Cancel the active session. Returns true if one was actually cancelled.
   */
  stopSpeaking(): boolean {
    const session = this.current;
    this.current = null;
    if (!session || session.cancelled) return false;

    session.controller.abort();
    this.output.cancel();
    logger.info('Playback', 'Speech cancelled', undefined, session.id);
    return true;
  }

  isSpeaking(): boolean {
    return this.current !== null;
  }

  currentSession(): PlaybackSession | null {
    return this.current;
  }

  private async render(session: ActiveSession): Promise<PlaybackOutcome> {
    const { signal } = session.controller;
    if (!session.text.trim()) return 'completed';

    logger.info('Playback', `Speaking: "${session.text}"`, undefined, session.id);

    try {
      for await (const chunk of this.synthesizer.synthesize(session.text, signal)) {
        if (signal.aborted) break;
        await this.output.playChunk(chunk);
        if (signal.aborted) break;
      }
    } catch (err) {
      if (signal.aborted) return 'cancelled';
      // A failed backend ends the session as if it had been cancelled
      session.controller.abort();
      logger.error('Playback', `${this.synthesizer.name} playback failed`, err, session.id);
      return 'failed';
    }

    return signal.aborted ? 'cancelled' : 'completed';
  }

  // EventEmitter type overrides
  on<K extends keyof PlaybackControllerEvents>(event: K, handler: PlaybackControllerEvents[K]): this {
    return super.on(event, handler);
  }
}
