export type StepCallback = (stepMs: number) => void;

/**
 * TickClock turns elapsed wall-clock time into whole fixed-length steps.
 * Leftover time below one step is carried to the next advance, so callers
 * may feed it irregular frame deltas.
 */
export class TickClock {
  private timer: ReturnType<typeof setInterval> | null = null;
  private speed = 1;
  private lastTick = 0;
  private accumulator = 0;
  private running = false;

  constructor(private readonly stepMs: number, private readonly onStep: StepCallback) {
    if (!Number.isFinite(stepMs) || stepMs <= 0) {
      throw new Error('Step length must be a positive number of milliseconds');
    }
  }

  /** Start the interval driver. */
  start(): void {
    this.stop();
    this.running = true;
    this.lastTick = Date.now();
    this.setupTimer();
  }

  /** Stop the interval driver. Pending leftover time is kept. */
  stop(): void {
    this.running = false;
    this.clearTimer();
  }

  isRunning(): boolean {
    return this.running;
  }

  setSpeed(multiplier: number): void {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new Error('Speed multiplier must be positive');
    }
    this.speed = multiplier;
    if (this.running) {
      this.setupTimer();
    }
  }

  /**
   * Advance manually by `deltaMs`. Ignored while the interval driver owns the
   * clock. Returns the number of steps fired.
   */
  advance(deltaMs: number): number {
    if (this.timer !== null) {
      return 0;
    }
    return this.accumulate(deltaMs);
  }

  /** Drop leftover time without firing. */
  reset(): void {
    this.accumulator = 0;
    this.lastTick = Date.now();
  }

  private accumulate(deltaMs: number): number {
    if (!Number.isFinite(deltaMs) || deltaMs <= 0) {
      return 0;
    }
    this.accumulator += deltaMs * this.speed;
    let fired = 0;
    while (this.accumulator >= this.stepMs) {
      this.accumulator -= this.stepMs;
      fired += 1;
      this.onStep(this.stepMs);
    }
    return fired;
  }

  private setupTimer(): void {
    this.clearTimer();
    if (!this.running) {
      return;
    }
    const interval = this.stepMs / this.speed;
    this.timer = setInterval(() => {
      const now = Date.now();
      const delta = now - this.lastTick;
      this.lastTick = now;
      this.accumulate(delta);
    }, interval);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
