import { describe, it, expect } from 'vitest';
import { captureTimestamp } from '../CommandLineCamera.js';

describe('captureTimestamp', () => {
  it('formats local time as a sortable file stamp', () => {
    expect(captureTimestamp(new Date(2024, 0, 31, 9, 45, 2))).toBe('20240131_094502');
  });
});
