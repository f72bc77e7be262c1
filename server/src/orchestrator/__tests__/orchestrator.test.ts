import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('@picovoice/porcupine-node', () => ({
  BuiltinKeyword: { COMPUTER: 'computer', JARVIS: 'jarvis', OK_GOOGLE: 'ok google', HEY_GOOGLE: 'hey google', ALEXA: 'alexa', PORCUPINE: 'porcupine' },
  Porcupine: class {},
}));
vi.mock('@picovoice/pvrecorder-node', () => ({
  PvRecorder: class {},
}));

import { Orchestrator, type VoiceComponents } from '../index.js';
import { WakeWordEngine } from '../../wakeword/engine.js';
import { PlaybackController } from '../../playback/PlaybackController.js';
import { InterruptionMonitor } from '../../playback/InterruptionMonitor.js';
import { DEFAULT_SETTINGS, applySettingsUpdate, type VoiceSettings } from '../../config/settings.js';
import { SettingsValidationError } from '../../errors.js';
import {
  FakeAssistant,
  FakeCamera,
  FakeInput,
  FakeOutput,
  FakeSynthesizer,
  ScriptedListener,
  ScriptedStrategy,
} from '../../__tests__/fakes.js';
import type { DetectorConfig, ServerMessage } from '../../types/index.js';

interface BuildOptions {
  hits?: boolean[];
  capture?: string[];
  degraded?: boolean;
  settings?: VoiceSettings;
}

function build(options: BuildOptions = {}) {
  const synthesizer = new FakeSynthesizer();
  const createEngine = vi.fn((config: DetectorConfig) => new WakeWordEngine(
    new ScriptedStrategy(options.hits ?? [], options.degraded ? 'energy' : config.method),
    config,
    options.degraded ?? false
  ));
  const components: VoiceComponents = {
    input: new FakeInput(),
    capture: new ScriptedListener(options.capture ?? []),
    playback: new PlaybackController(synthesizer, new FakeOutput()),
    monitor: new InterruptionMonitor(new ScriptedListener(), 3000),
    assistant: new FakeAssistant(),
    camera: new FakeCamera(),
  };

  const orchestrator = new Orchestrator({
    settings: options.settings ?? DEFAULT_SETTINGS,
    createEngine,
    createComponents: () => components,
    now: () => 0,
  });
  const broadcasts: ServerMessage[] = [];
  orchestrator.on('broadcast', (message: ServerMessage) => broadcasts.push(message));
  created.push(orchestrator);

  return { orchestrator, createEngine, components, synthesizer, broadcasts };
}

const created: Orchestrator[] = [];

describe('Orchestrator', () => {
  afterEach(() => {
    for (const orchestrator of created.splice(0)) {
      orchestrator.shutdown();
    }
  });

  it('reports an idle status before initialization', () => {
    const { orchestrator } = build();

    expect(orchestrator.getStatus()).toEqual({
      state: 'SLEEP',
      running: false,
      speaking: false,
      micOwner: null,
      wakeword: { configured: 'model', active: null, degraded: false },
      sleepInSeconds: 0,
      settings: DEFAULT_SETTINGS,
    });
  });

  it('reports a degraded wake word engine', () => {
    const { orchestrator, createEngine } = build({ degraded: true });

    orchestrator.initialize();
    orchestrator.initialize();

    expect(createEngine).toHaveBeenCalledTimes(1);
    expect(orchestrator.getStatus().wakeword).toEqual({ configured: 'model', active: 'energy', degraded: true });
  });

  it('rebuilds the engine only when detector settings change', () => {
    const { orchestrator, createEngine, broadcasts } = build();
    orchestrator.initialize();

    orchestrator.updateSettings({ wakeword: { sensitivity: 0.9 } });
    expect(createEngine).toHaveBeenCalledTimes(2);
    expect(createEngine.mock.calls[1][0]).toMatchObject({ method: 'model', sensitivity: 0.9 });

    const next = orchestrator.updateSettings({ 'activity.sleepTimeoutSeconds': 30 });
    expect(createEngine).toHaveBeenCalledTimes(2);
    expect(next.activity.sleepTimeoutSeconds).toBe(30);
    expect(orchestrator.getSettings()).toBe(next);

    const settingsMessages = broadcasts.filter((m) => m.type === 'settings');
    expect(settingsMessages.map((m) => m.payload)).toEqual([
      { ...DEFAULT_SETTINGS, wakeword: { ...DEFAULT_SETTINGS.wakeword, sensitivity: 0.9 } },
      next,
    ]);
  });

  it('builds the detector for the rate the microphone delivers', () => {
    const settings = applySettingsUpdate(DEFAULT_SETTINGS, { 'audio.sampleRate': 48000 });
    const { orchestrator, createEngine, components } = build({ settings });
    expect(components.input.sampleRate).toBe(16000);

    orchestrator.initialize();
    orchestrator.updateSettings({ wakeword: { sensitivity: 0.9 } });

    expect(createEngine.mock.calls.map(([config]) => config.sampleRate)).toEqual([16000, 16000]);
    expect(orchestrator.getSettings().audio.sampleRate).toBe(48000);
  });

  it('leaves settings untouched on an invalid update', () => {
    const { orchestrator } = build();
    orchestrator.initialize();

    expect(() => orchestrator.updateSettings({ wakeword: { method: 'magic' } })).toThrow(SettingsValidationError);
    expect(orchestrator.getSettings()).toBe(DEFAULT_SETTINGS);
  });

  it('reports invalid client settings as an error message', () => {
    const { orchestrator, broadcasts } = build();

    orchestrator.handleClientMessage({ type: 'update_settings', payload: { wakeword: { sensitivity: 3 } } });

    const errors = broadcasts.filter((m) => m.type === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].payload).toMatchObject({ message: 'Invalid settings update' });
    expect(orchestrator.getSettings()).toBe(DEFAULT_SETTINGS);
  });

  it('does not request sleep while asleep', () => {
    const { orchestrator } = build();

    expect(orchestrator.requestSleep()).toBe(false);
    orchestrator.initialize();
    expect(orchestrator.requestSleep()).toBe(false);
  });

  it('runs until a shutdown command', async () => {
    const { orchestrator, synthesizer, broadcasts } = build({ hits: [true], capture: ['shut down'] });
    let shutdownRequests = 0;
    orchestrator.on('shutdownRequested', () => shutdownRequests++);

    await orchestrator.start();

    const events = broadcasts.filter((m) => m.type !== 'log');
    expect(events.map((m) => m.type)).toEqual(['state_change', 'wake', 'utterance']);
    expect(events[0].payload).toMatchObject({ state: 'ACTIVE' });
    expect(events[1].payload).toEqual({ method: 'model' });
    expect(events[2]).toMatchObject({ payload: { text: 'shut down' }, turnId: 'turn_1' });
    expect(synthesizer.spoken).toEqual(['Shutting down']);
    expect(shutdownRequests).toBe(1);
    expect(orchestrator.getStatus().running).toBe(false);
  });

  it('forwards log entries to clients', () => {
    const { orchestrator, broadcasts } = build();

    orchestrator.initialize();
    orchestrator.updateSettings({});

    expect(broadcasts.some((m) => m.type === 'log')).toBe(true);
  });
});
