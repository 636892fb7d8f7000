export type TimerPhase = "green" | "yellow" | "red";

export interface TimerResult {
  elapsedSeconds: number;
  wasExpired: boolean;
}

export interface Disposable {
  dispose(): void;
}

const TICK_INTERVAL_MS = 1000;

/**
 * Countdown Timer
 *
 * One tick per second. Each tick moves one second from remaining to
 * elapsed, so the two always sum to the duration. Reaching zero fires
 * the expired callbacks once and stops the timer.
 *
 * Color phases:
 *   green  -- >50% remaining
 *   yellow -- 25-50% remaining
 *   red    -- <25% remaining
 */
export class CountdownTimer {
  private _durationSeconds = 0;
  private _remainingSeconds = 0;
  private _elapsedSeconds = 0;
  private _isRunning = false;
  private _hasExpired = false;
  private _intervalId: ReturnType<typeof setInterval> | null = null;

  private _tickCallbacks: Array<(remainingSeconds: number, elapsedSeconds: number, phase: TimerPhase) => void> = [];
  private _expiredCallbacks: Array<() => void> = [];

  get isRunning(): boolean { return this._isRunning; }
  get durationSeconds(): number { return this._durationSeconds; }
  get remainingSeconds(): number { return this._remainingSeconds; }
  get elapsedSeconds(): number { return this._elapsedSeconds; }

  start(durationSeconds: number): void {
    this.stop();
    this._durationSeconds = Math.max(0, Math.floor(durationSeconds));
    this._remainingSeconds = this._durationSeconds;
    this._elapsedSeconds = 0;
    this._hasExpired = false;
    this._isRunning = true;

    this._intervalId = setInterval(() => this.tick(), TICK_INTERVAL_MS);
  }

  stop(): TimerResult {
    if (this._intervalId !== null) {
      clearInterval(this._intervalId);
      this._intervalId = null;
    }
    this._isRunning = false;

    return { elapsedSeconds: this._elapsedSeconds, wasExpired: this._hasExpired };
  }

  getPhase(): TimerPhase {
    if (this._durationSeconds === 0) { return "green"; }
    const ratio = this._remainingSeconds / this._durationSeconds;
    if (ratio > 0.5) { return "green"; }
    if (ratio > 0.25) { return "yellow"; }
    return "red";
  }

  /** Advance by one second. No-op once stopped. */
  tick(): void {
    if (!this._isRunning) { return; }

    if (this._remainingSeconds > 0) {
      this._remainingSeconds--;
      this._elapsedSeconds++;
    }

    const phase = this.getPhase();
    for (const cb of this._tickCallbacks) {
      cb(this._remainingSeconds, this._elapsedSeconds, phase);
    }

    if (this._remainingSeconds <= 0 && !this._hasExpired) {
      this._hasExpired = true;
      this.stop();
      for (const cb of this._expiredCallbacks) {
        cb();
      }
    }
  }

  onTick(callback: (remainingSeconds: number, elapsedSeconds: number, phase: TimerPhase) => void): Disposable {
    this._tickCallbacks.push(callback);
    return { dispose: () => { this._tickCallbacks = this._tickCallbacks.filter((c) => c !== callback); } };
  }

  onExpired(callback: () => void): Disposable {
    this._expiredCallbacks.push(callback);
    return { dispose: () => { this._expiredCallbacks = this._expiredCallbacks.filter((c) => c !== callback); } };
  }
}
