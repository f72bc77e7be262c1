/**
 * Control Loop
 * Owns the SLEEP/ACTIVE session state and runs the voice engine tick by tick.
 *
 * SLEEP:  one frame per tick goes to the wake word engine.
 * ACTIVE: one bounded capture per tick; recognized text starts a turn loop
 *         (assistant -> speak while monitoring for barge-in -> next utterance).
 *
 * The microphone has exactly one consumer at a time. Phases run strictly in
 * sequence and every consumer claims the mic through acquireMic(), which
 * refuses a second owner.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { MicrophoneUnavailableError } from '../errors.js';
import { APOLOGY, type Assistant } from '../assistant/Assistant.js';
import { isSleepPhrase, matchSpecialCommand, runSpecialCommand } from '../commands/specialCommands.js';
import type { ActivityClock } from './ActivityClock.js';
import type { AudioInput } from '../audio/AudioDevice.js';
import type { Camera } from '../camera/Camera.js';
import type { Listener } from '../speech/UtteranceCapture.js';
import type { PlaybackController } from '../playback/PlaybackController.js';
import type { InterruptionMonitor } from '../playback/InterruptionMonitor.js';
import type { WakeWordEngine } from '../wakeword/engine.js';
import type { VoiceSettings } from '../config/settings.js';
import type { MicConsumer, SessionState, SleepReason } from '../types/index.js';

export const FAREWELLS: Record<Exclude<SleepReason, 'shutdown'>, string> = {
  timeout: 'Going to sleep due to inactivity.',
  phrase: 'Going to sleep. Say the wake word when you need me.',
  request: 'Going to sleep.',
};

export interface LoopTiming {
  captureTimeoutMs: number;
  frameReadTimeoutMs: number;
  videoDurationSeconds: number;
}

export interface ControlLoopDeps {
  input: AudioInput;
  engine: WakeWordEngine;
  capture: Listener;
  playback: PlaybackController;
  monitor: InterruptionMonitor;
  assistant: Assistant;
  camera: Camera;
  clock: ActivityClock;
  settings: VoiceSettings;
  timing?: Partial<LoopTiming>;
}

export interface ControlLoopEvents {
  stateChange: (newState: SessionState, oldState: SessionState, reason?: SleepReason) => void;
  wake: () => void;
  utterance: (text: string, turnId: string) => void;
  response: (text: string, turnId: string) => void;
  interruption: (text: string, turnId: string) => void;
  micOwner: (owner: MicConsumer | null) => void;
  tickError: (err: unknown) => void;
  shutdown: () => void;
}

interface PendingUpdate {
  settings: VoiceSettings;
  engine?: WakeWordEngine;
}

export class ControlLoop extends EventEmitter {
  private state: SessionState = 'SLEEP';
  private mic: MicConsumer | null = null;

  private engine: WakeWordEngine;
  private settings: VoiceSettings;
  private readonly timing: LoopTiming;

  private pending: PendingUpdate | null = null;
  private sleepRequested = false;
  private running = false;
  private stopRequested = false;
  private turnCount = 0;

  constructor(private readonly deps: ControlLoopDeps) {
    super();
    this.engine = deps.engine;
    this.settings = deps.settings;
    this.timing = {
      captureTimeoutMs: deps.timing?.captureTimeoutMs ?? ENV.CAPTURE_TIMEOUT_MS,
      frameReadTimeoutMs: deps.timing?.frameReadTimeoutMs ?? ENV.FRAME_READ_TIMEOUT_MS,
      videoDurationSeconds: deps.timing?.videoDurationSeconds ?? ENV.VIDEO_DURATION_SECONDS,
    };
  }

  // ============== Getters ==============

  getState(): SessionState {
    return this.state;
  }

  getMicOwner(): MicConsumer | null {
    return this.mic;
  }

  getEngine(): WakeWordEngine {
    return this.engine;
  }

  getSettings(): VoiceSettings {
    return this.settings;
  }

  isRunning(): boolean {
    return this.running;
  }

  isSpeaking(): boolean {
    return this.deps.playback.isSpeaking();
  }

  /**
   * Milliseconds left before inactivity sends an ACTIVE session to sleep
   */
  getSleepRemainingMs(): number {
    if (this.state === 'SLEEP') return 0;
    return Math.max(0, this.sleepTimeoutMs() - this.deps.clock.elapsed());
  }

  // ============== Lifecycle ==============

  /**
   * Open the microphone and tick until stop(). A microphone that cannot be
   * opened, or that fails while running, rejects this promise.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Control loop is already running');
    }

    this.running = true;
    this.stopRequested = false;
    try {
      await this.deps.input.open();
    } catch (err) {
      this.running = false;
      throw err;
    }
    logger.info('ControlLoop', `Listening for wake word ('${this.settings.wakeword.keyword}', ${this.engine.method})`);

    try {
      while (!this.stopRequested) {
        await this.tick();
      }
    } finally {
      this.running = false;
      this.deps.playback.stopSpeaking();
      this.pending?.engine?.release();
      this.pending = null;
      this.engine.release();
      this.deps.input.close();
      logger.info('ControlLoop', 'Stopped');
    }
  }

  stop(): void {
    if (this.stopRequested) return;
    logger.info('ControlLoop', 'Stop requested');
    this.stopRequested = true;
    this.deps.playback.stopSpeaking();
  }

  /**
   * Return to SLEEP at the next tick
   */
  requestSleep(): void {
    if (this.state === 'SLEEP') return;
    this.sleepRequested = true;
    this.deps.playback.stopSpeaking();
  }

  /**
   * Queue a new settings snapshot (and a rebuilt engine) for the next tick
   */
  applySettings(settings: VoiceSettings, engine?: WakeWordEngine): void {
    if (this.pending?.engine && this.pending.engine !== engine) {
      this.pending.engine.release();
    }
    this.pending = { settings, engine };
  }

  // ============== Tick ==============

  async tick(): Promise<void> {
    this.applyPending();

    try {
      if (this.state === 'SLEEP') {
        await this.sleepTick();
      } else {
        await this.activeTick();
      }
    } catch (err) {
      if (err instanceof MicrophoneUnavailableError) throw err;

      logger.error('ControlLoop', 'Tick failed', err);
      this.emit('tickError', err);
      if (this.state === 'ACTIVE') {
        await this.say(APOLOGY);
      }
    }
  }

  private applyPending(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;

    this.settings = pending.settings;
    if (pending.engine && pending.engine !== this.engine) {
      this.engine.release();
      this.engine = pending.engine;
      logger.info('ControlLoop', `Wake word engine replaced (${this.engine.method})`);
    }
  }

  private async sleepTick(): Promise<void> {
    this.sleepRequested = false;

    const detected = await this.withMic('wakeword', async () => {
      const frame = await this.deps.input.readFrame(this.engine.frameLength, this.timing.frameReadTimeoutMs);
      return frame !== null && this.engine.detect(frame);
    });
    if (!detected) return;

    this.deps.clock.touch();
    this.transition('ACTIVE');
    this.emit('wake');
  }

  private async activeTick(): Promise<void> {
    if (this.sleepRequested) {
      this.sleepRequested = false;
      await this.goToSleep('request');
      return;
    }

    if (this.deps.clock.elapsed() > this.sleepTimeoutMs()) {
      await this.goToSleep('timeout');
      return;
    }

    const text = await this.withMic('capture', () => this.deps.capture.listen(this.timing.captureTimeoutMs));
    if (!text) return;

    await this.converse(text);
  }

  // ============== Conversation ==============

  /**
   * Handle an utterance and any barge-in utterances that follow it
   */
  private async converse(first: string): Promise<void> {
    let utterance: string | null = first;

    while (utterance !== null && this.state === 'ACTIVE' && !this.stopRequested && !this.sleepRequested) {
      const turnId = `turn_${++this.turnCount}`;
      this.deps.clock.touch();
      logger.info('ControlLoop', `Heard: "${utterance}"`, undefined, turnId);
      this.emit('utterance', utterance, turnId);

      try {
        utterance = await this.handleTurn(utterance, turnId);
      } finally {
        // A failed turn still counts as activity
        this.deps.clock.touch();
      }
    }
  }

  /**
   * Returns the next utterance when one was heard while the response played
   */
  private async handleTurn(text: string, turnId: string): Promise<string | null> {
    if (isSleepPhrase(text)) {
      await this.goToSleep('phrase');
      return null;
    }

    const command = matchSpecialCommand(text);
    if (command) {
      await runSpecialCommand(command, {
        camera: this.deps.camera,
        videoDurationSeconds: this.timing.videoDurationSeconds,
        say: (line) => this.say(line),
        shutdown: () => {
          this.emit('shutdown');
          this.stop();
        },
        turnId,
      });
      return null;
    }

    let response: string;
    try {
      response = await this.deps.assistant.process(text, turnId);
    } catch (err) {
      logger.error('ControlLoop', `${this.deps.assistant.name} failed`, err, turnId);
      response = APOLOGY;
    }

    this.emit('response', response, turnId);
    return this.respond(response, turnId);
  }

  /**
   * Speak `text` while the interruption monitor listens. Both workers are
   * joined before this returns. Resolves with a barge-in, or with a reply
   * the monitor was still recording when playback ended.
   */
  private async respond(text: string, turnId: string): Promise<string | null> {
    const { playback, monitor } = this.deps;
    const session = playback.speak(text);
    const finished = session.done.then(() => null);

    const stopMonitor = new AbortController();
    this.acquireMic('monitor');

    try {
      const watching = monitor.watch(stopMonitor.signal);
      // A monitor that gives up leaves playback to finish on its own
      const interrupted: Promise<string | null> = watching.then((h) => h ?? finished);
      const heard = await Promise.race([finished, interrupted]);

      if (heard !== null) {
        playback.stopSpeaking();
        logger.info('ControlLoop', `Barge-in: "${heard}"`, undefined, turnId);
        this.emit('interruption', heard, turnId);
      }

      stopMonitor.abort();
      const [, late] = await Promise.all([session.done, watching]);
      if (heard === null && late !== null) {
        logger.info('ControlLoop', `Reply overlapped the end of the response: "${late}"`, undefined, turnId);
      }
      return heard ?? late;
    } finally {
      stopMonitor.abort();
      this.releaseMic('monitor');
    }
  }

  /**
   * Speak and wait for playback to end. Never rejects.
   */
  private async say(text: string): Promise<void> {
    await this.deps.playback.speak(text).done;
  }

  private async goToSleep(reason: SleepReason): Promise<void> {
    if (this.state === 'SLEEP') return;

    this.deps.playback.stopSpeaking();
    this.transition('SLEEP', reason);
    if (reason !== 'shutdown') {
      await this.say(FAREWELLS[reason]);
    }
    this.engine.reset();
  }

  // ============== State ==============

  private transition(newState: SessionState, reason?: SleepReason): void {
    const oldState = this.state;
    if (oldState === newState) return;

    logger.info('ControlLoop', `Transition: ${oldState} -> ${newState}${reason ? ` (${reason})` : ''}`);
    this.state = newState;
    this.emit('stateChange', newState, oldState, reason);
  }

  private sleepTimeoutMs(): number {
    return this.settings.activity.sleepTimeoutSeconds * 1000;
  }

  // ============== Microphone ownership ==============

  private acquireMic(consumer: MicConsumer): void {
    if (this.mic !== null) {
      throw new Error(`Microphone requested by ${consumer} while owned by ${this.mic}`);
    }
    this.mic = consumer;
    this.emit('micOwner', consumer);
  }

  private releaseMic(consumer: MicConsumer): void {
    if (this.mic !== consumer) return;
    this.mic = null;
    this.emit('micOwner', null);
  }

  private async withMic<T>(consumer: MicConsumer, use: () => Promise<T>): Promise<T> {
    this.acquireMic(consumer);
    try {
      return await use();
    } finally {
      this.releaseMic(consumer);
    }
  }

  // EventEmitter type overrides
  on<K extends keyof ControlLoopEvents>(event: K, handler: ControlLoopEvents[K]): this {
    return super.on(event, handler);
  }
}
