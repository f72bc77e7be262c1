import { describe, it, expect, vi, afterEach } from 'vitest';
import { addLogListener, formatLine, logger, summarize, type LogEntry } from '../logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('summarize', () => {
  it('reduces audio buffers to a byte count', () => {
    expect(summarize(new Int16Array(160))).toBe('[pcm 320 bytes]');
  });

  it('keeps only the name and message of errors', () => {
    expect(summarize(new TypeError('bad frame'))).toEqual({ name: 'TypeError', message: 'bad frame' });
  });

  it('truncates long strings and arrays', () => {
    expect(summarize('x'.repeat(600))).toBe(`${'x'.repeat(500)}...`);
    expect(summarize([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('cuts off deeply nested objects', () => {
    expect(summarize({ a: { b: { c: { d: { e: 1 } } } } })).toEqual({ a: { b: { c: { d: '[...]' } } } });
  });
});

describe('formatLine', () => {
  it('prints time, level, category and turn', () => {
    const entry: LogEntry = {
      level: 'WARN',
      category: 'ControlLoop',
      message: 'Heard: "hello"',
      ts: Date.UTC(2024, 0, 31, 9, 45, 2, 7),
      turnId: 'turn_3',
    };

    expect(formatLine(entry)).toBe('[09:45:02.007] [WARN] [ControlLoop] (turn_3) Heard: "hello"');
  });
});

describe('logger', () => {
  it('streams summarized entries to listeners until removed', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const remove = addLogListener((entry) => entries.push(entry));

    logger.info('Capture', 'Captured audio', new Int16Array(4), 'turn_1');
    remove();
    logger.info('Capture', 'Not seen');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'INFO',
      category: 'Capture',
      message: 'Captured audio',
      data: '[pcm 8 bytes]',
      turnId: 'turn_1',
    });
  });

  it('routes errors to console.error with the payload', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.error('Playback', 'Speaker failed', new Error('device busy'));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/\[ERROR\] \[Playback\] Speaker failed$/);
    expect(spy.mock.calls[0][1]).toEqual({ name: 'Error', message: 'device busy' });
  });

  it('keeps logging when a listener throws', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const removeBad = addLogListener(() => {
      throw new Error('listener broke');
    });
    const removeGood = addLogListener((entry) => entries.push(entry));

    logger.warn('WebSocket', 'Ignoring invalid message');
    removeBad();
    removeGood();

    expect(entries).toHaveLength(1);
    expect(errors).toHaveBeenCalledTimes(1);
  });
});
