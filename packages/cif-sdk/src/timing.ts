/** Milliseconds from an arbitrary, monotonic origin. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

export class Stopwatch {
  private readonly clock: Clock;
  private readonly startedAt: number;

  private constructor(clock: Clock) {
    this.clock = clock;
    this.startedAt = clock();
  }

  static start(clock: Clock = monotonicClock): Stopwatch {
    return new Stopwatch(clock);
  }

  /** Fractional seconds since start. */
  elapsedSeconds(): number {
    return (this.clock() - this.startedAt) / 1000;
  }
}
