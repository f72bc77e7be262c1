/**
 * Tracks time since the last meaningful interaction (wake, utterance,
 * interruption). Written only by the control loop.
 */
export class ActivityClock {
  private last: number;

  constructor(private readonly now: () => number = Date.now) {
    this.last = now();
  }

  touch(): void {
    this.last = this.now();
  }

  elapsed(): number {
    return this.now() - this.last;
  }

  lastActivity(): number {
    return this.last;
  }
}
