import { describe, it, expect } from 'vitest';
import { ActivityClock } from '../ActivityClock.js';

describe('ActivityClock', () => {
  it('measures time since the last touch', () => {
    let now = 1000;
    const clock = new ActivityClock(() => now);

    now = 4000;
    expect(clock.elapsed()).toBe(3000);

    clock.touch();
    now = 4500;
    expect(clock.elapsed()).toBe(500);
    expect(clock.lastActivity()).toBe(4000);
  });
});
