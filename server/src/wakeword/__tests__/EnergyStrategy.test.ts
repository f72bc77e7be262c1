import { describe, it, expect } from 'vitest';
import { EnergyStrategy } from '../EnergyStrategy.js';
import { constantFrame, detectorConfig } from '../../__tests__/fakes.js';

const frame = (value: number) => constantFrame(512, value);

describe('EnergyStrategy', () => {
  it('takes its frame shape from the config', () => {
    const strategy = new EnergyStrategy(detectorConfig, 1500);

    expect(strategy.method).toBe('energy');
    expect(strategy.frameLength).toBe(512);
    expect(strategy.sampleRate).toBe(16000);
    expect(strategy.refractoryMs).toBe(1500);
  });

  it('never fires on silence', () => {
    const strategy = new EnergyStrategy(detectorConfig);
    const hits = Array.from({ length: 50 }, () => strategy.process(frame(0)));
    expect(hits.some(Boolean)).toBe(false);
  });

  it('fires on a spike above twice the recent average', () => {
    const strategy = new EnergyStrategy(detectorConfig);
    const hits = [1200, 1200, 1200, 1200, 3600].map((v) => strategy.process(frame(v)));
    expect(hits).toEqual([false, false, false, false, true]);
  });

  it('fires once for a sustained loud sound', () => {
    const strategy = new EnergyStrategy(detectorConfig);
    const levels = [0, 0, 0, 0, ...Array<number>(10).fill(8000)];
    const hits = levels.map((v) => strategy.process(frame(v)));

    expect(hits.filter(Boolean)).toHaveLength(1);
    expect(hits.indexOf(true)).toBe(4);
  });

  it('ignores a constant loud level', () => {
    const strategy = new EnergyStrategy(detectorConfig);
    const hits = Array.from({ length: 10 }, () => strategy.process(frame(5000)));
    expect(hits.some(Boolean)).toBe(false);
  });

  it('ignores spikes below the absolute floor', () => {
    const strategy = new EnergyStrategy(detectorConfig);
    const hits = [0, 0, 0, 0, 2900].map((v) => strategy.process(frame(v)));
    expect(hits.some(Boolean)).toBe(false);
  });
});
