/**
 * Orchestrator
 * Builds the voice engine from a settings snapshot, owns the control loop
 * and is the single entry point for settings updates. Everything clients
 * should see is re-emitted as a ServerMessage on 'broadcast'.
 */

import { EventEmitter } from 'events';
import { logger, addLogListener } from '../utils/logger.js';
import { ENV } from '../config/env.js';
import { SettingsValidationError } from '../errors.js';
import {
  applySettingsUpdate,
  detectorChanged,
  detectorConfigFrom,
  settingsFromEnv,
  type VoiceSettings,
} from '../config/settings.js';
import { ActivityClock } from '../state/ActivityClock.js';
import { ControlLoop } from '../state/ControlLoop.js';
import { createWakeWordEngine, type WakeWordEngine } from '../wakeword/engine.js';
import { PvRecorderInput } from '../audio/PvRecorderInput.js';
import { PlayerOutput } from '../audio/PlayerOutput.js';
import { OpenAITranscriber } from '../speech/OpenAITranscriber.js';
import { OpenAISpeechSynthesizer } from '../speech/OpenAISpeechSynthesizer.js';
import { UtteranceCapture, type Listener } from '../speech/UtteranceCapture.js';
import { PlaybackController } from '../playback/PlaybackController.js';
import { InterruptionMonitor } from '../playback/InterruptionMonitor.js';
import { OpenAIAssistant } from '../assistant/OpenAIAssistant.js';
import { CommandLineCamera } from '../camera/CommandLineCamera.js';
import type { Assistant } from '../assistant/Assistant.js';
import type { AudioInput } from '../audio/AudioDevice.js';
import type { Camera } from '../camera/Camera.js';
import type {
  ClientMessage,
  DetectorConfig,
  MicConsumer,
  ServerMessage,
  SessionState,
  WakeWordMethod,
} from '../types/index.js';

export interface VoiceComponents {
  input: AudioInput;
  capture: Listener;
  playback: PlaybackController;
  monitor: InterruptionMonitor;
  assistant: Assistant;
  camera: Camera;
}

export interface OrchestratorOptions {
  settings?: VoiceSettings;
  createEngine?: (config: DetectorConfig) => WakeWordEngine;
  createComponents?: (settings: VoiceSettings) => VoiceComponents;
  now?: () => number;
}

export interface VoiceStatus {
  state: SessionState;
  running: boolean;
  speaking: boolean;
  micOwner: MicConsumer | null;
  wakeword: {
    configured: WakeWordMethod;
    active: WakeWordMethod | null;
    degraded: boolean;
  };
  sleepInSeconds: number;
  settings: VoiceSettings;
}

/**
 * What the HTTP API needs from the voice engine
 */
export interface VoiceService {
  getStatus(): VoiceStatus;
  getSettings(): VoiceSettings;
  updateSettings(patch: unknown): VoiceSettings;
  requestSleep(): boolean;
}

export function createDefaultComponents(settings: VoiceSettings): VoiceComponents {
  const input = new PvRecorderInput(settings.audio.frameSize);
  const synthesizer = new OpenAISpeechSynthesizer();
  const capture = new UtteranceCapture(input, new OpenAITranscriber(), {
    frameSize: settings.audio.frameSize,
    energyThreshold: ENV.SPEECH_ENERGY_THRESHOLD,
    silenceMs: ENV.SILENCE_DURATION_MS,
    phraseLimitMs: ENV.PHRASE_TIME_LIMIT_MS,
    readTimeoutMs: ENV.FRAME_READ_TIMEOUT_MS,
    transcribeTimeoutMs: ENV.TRANSCRIBE_TIMEOUT_MS,
  });

  return {
    input,
    capture,
    playback: new PlaybackController(synthesizer, new PlayerOutput(synthesizer.sampleRate)),
    monitor: new InterruptionMonitor(capture, ENV.INTERRUPT_LISTEN_TIMEOUT_MS),
    assistant: new OpenAIAssistant(),
    camera: new CommandLineCamera(),
  };
}

export class Orchestrator extends EventEmitter implements VoiceService {
  private settings: VoiceSettings;
  private loop: ControlLoop | null = null;
  private removeLogListener: (() => void) | null = null;
  private inputSampleRate: number | null = null;

  private readonly createEngine: (config: DetectorConfig) => WakeWordEngine;
  private readonly createComponents: (settings: VoiceSettings) => VoiceComponents;
  private readonly clock: ActivityClock;

  constructor(options: OrchestratorOptions = {}) {
    super();
    this.settings = options.settings ?? settingsFromEnv();
    this.createEngine = options.createEngine ?? ((config) => createWakeWordEngine(config));
    this.createComponents = options.createComponents ?? createDefaultComponents;
    this.clock = new ActivityClock(options.now);
  }

  /**
   * Build the engine and the control loop. Safe to call more than once.
   */
  initialize(): void {
    if (this.loop) return;
    logger.info('Orchestrator', 'Initializing voice engine', this.settings);

    const components = this.createComponents(this.settings);
    this.inputSampleRate = components.input.sampleRate;
    const engine = this.createEngine(this.detectorConfig(this.settings));
    const loop = new ControlLoop({
      ...components,
      engine,
      clock: this.clock,
      settings: this.settings,
    });
    this.setupLoopHandlers(loop);
    this.loop = loop;

    // Forward logs to clients
    this.removeLogListener = addLogListener((entry) => {
      this.broadcast({ type: 'log', payload: entry, ts: entry.ts, turnId: entry.turnId });
    });
  }

  /**
   * Run the voice engine until it stops. Rejects when the microphone fails.
   */
  async start(): Promise<void> {
    this.initialize();
    if (!this.loop) return;
    await this.loop.run();
  }

  shutdown(): void {
    logger.info('Orchestrator', 'Shutting down');
    this.loop?.stop();
    this.removeLogListener?.();
    this.removeLogListener = null;
  }

  // ============== Settings ==============

  getSettings(): VoiceSettings {
    return this.settings;
  }

  /**
   * Validate and apply a settings patch. Throws SettingsValidationError.
   * The wake word engine is rebuilt when detector settings change.
   */
  updateSettings(patch: unknown): VoiceSettings {
    const next = applySettingsUpdate(this.settings, patch);
    const rebuild = detectorChanged(this.settings, next);
    this.settings = next;

    if (this.loop) {
      const engine = rebuild ? this.createEngine(this.detectorConfig(next)) : undefined;
      this.loop.applySettings(next, engine);
    }

    logger.info('Orchestrator', `Settings updated${rebuild ? ' (wake word engine rebuilt)' : ''}`, next);
    this.broadcast({ type: 'settings', payload: next, ts: Date.now() });
    return next;
  }

  private detectorConfig(settings: VoiceSettings): DetectorConfig {
    const rate = this.inputSampleRate ?? undefined;
    if (rate !== undefined && rate !== settings.audio.sampleRate) {
      logger.warn('Orchestrator', `Microphone delivers ${rate} Hz, ignoring configured ${settings.audio.sampleRate} Hz`);
    }
    return detectorConfigFrom(settings, rate);
  }

  // ============== Status ==============

  getStatus(): VoiceStatus {
    const loop = this.loop;
    const engine = loop?.getEngine();
    return {
      state: loop?.getState() ?? 'SLEEP',
      running: loop?.isRunning() ?? false,
      speaking: loop?.isSpeaking() ?? false,
      micOwner: loop?.getMicOwner() ?? null,
      wakeword: {
        configured: this.settings.wakeword.method,
        active: engine?.method ?? null,
        degraded: engine?.degraded ?? false,
      },
      sleepInSeconds: Math.ceil((loop?.getSleepRemainingMs() ?? 0) / 1000),
      settings: this.settings,
    };
  }

  /**
   * Ask the loop to return to SLEEP. Returns false when already asleep.
   */
  requestSleep(): boolean {
    if (!this.loop || this.loop.getState() === 'SLEEP') return false;
    this.loop.requestSleep();
    return true;
  }

  // ============== Client Message Handling ==============

  handleClientMessage(message: ClientMessage): void {
    logger.debug('Orchestrator', `Client message: ${message.type}`, message.payload);

    switch (message.type) {
      case 'update_settings':
        try {
          this.updateSettings(message.payload);
        } catch (err) {
          if (!(err instanceof SettingsValidationError)) throw err;
          logger.warn('Orchestrator', err.message, err.issues);
          this.broadcast({
            type: 'error',
            payload: { message: err.message, issues: err.issues },
            ts: Date.now(),
          });
        }
        break;

      case 'sleep':
        this.requestSleep();
        break;

      default:
        logger.warn('Orchestrator', `Unknown message type: ${message.type}`);
    }
  }

  // ============== Loop Events ==============

  private setupLoopHandlers(loop: ControlLoop): void {
    loop.on('stateChange', (state, _oldState, reason) => {
      this.broadcast({
        type: 'state_change',
        payload: { ...this.getStatus(), state, reason },
        ts: Date.now(),
      });
    });

    loop.on('wake', () => {
      this.broadcast({ type: 'wake', payload: { method: loop.getEngine().method }, ts: Date.now() });
    });

    loop.on('utterance', (text, turnId) => {
      this.broadcast({ type: 'utterance', payload: { text }, ts: Date.now(), turnId });
    });

    loop.on('response', (text, turnId) => {
      this.broadcast({ type: 'response', payload: { text }, ts: Date.now(), turnId });
    });

    loop.on('interruption', (text, turnId) => {
      this.broadcast({ type: 'interruption', payload: { text }, ts: Date.now(), turnId });
    });

    loop.on('tickError', (err) => {
      this.broadcast({
        type: 'error',
        payload: { message: err instanceof Error ? err.message : String(err) },
        ts: Date.now(),
      });
    });

    loop.on('shutdown', () => {
      this.emit('shutdownRequested');
    });
  }

  private broadcast(message: ServerMessage): void {
    this.emit('broadcast', message);
  }
}

// Singleton instance
export const orchestrator = new Orchestrator();
