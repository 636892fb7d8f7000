import type { CodeResolver, ResolvedCode } from "./code-source";
import { toLogicalChar, type RawKeyEvent } from "./key-input";
import type { LanguageId } from "./languages";
import { accuracyPercentage, progressPercentage, wordsPerMinute } from "./metrics";
import { CountdownTimer, type Disposable, type TimerPhase } from "./timer";
import { TypingMatcher, type KeystrokeOutcome, type MatcherState } from "./typing-matcher";
import type { Logger } from "../utils/logger";

export type SessionOutcome = "completed" | "timed_out" | "aborted";

/** Read-only view of the running session for the presentation layer. */
export interface SessionSnapshot {
  language: LanguageId;
  state: MatcherState;
  target: string;
  typed: string;
  position: number;
  targetLength: number;
  errorCount: number;
  totalKeystrokes: number;
  durationSeconds: number;
  remainingSeconds: number;
  elapsedSeconds: number;
  phase: TimerPhase;
  progress: number;
  accuracy: number;
  wpm: number;
  lastOutcome: KeystrokeOutcome | null;
}

export interface SessionResult {
  outcome: SessionOutcome;
  language: LanguageId;
  accuracy: number;
  wpm: number;
  progress: number;
  elapsedSeconds: number;
  errorCount: number;
  totalKeystrokes: number;
  position: number;
  targetLength: number;
  usedFallback: boolean;
}

export interface SessionObserver {
  onLoading?(language: LanguageId): void;
  onSessionStarted?(snapshot: SessionSnapshot, code: ResolvedCode): void;
  onProgress?(outcome: KeystrokeOutcome, snapshot: SessionSnapshot): void;
  onTick?(snapshot: SessionSnapshot): void;
  onWarning?(message: string): void;
  onSessionEnded?(result: SessionResult): void;
}

/**
 * Active session state tracked in memory.
 */
interface ActiveSession {
  language: LanguageId;
  durationSeconds: number;
  usedFallback: boolean;
  startedAt: string;
  lastOutcome: KeystrokeOutcome | null;
}

/**
 * Session Manager
 *
 * Runs one practice attempt at a time by coordinating:
 *   - Code resolution (generated code or built-in fallback)
 *   - The typing matcher (keystrokes)
 *   - The countdown timer (ticks, expiry)
 *   - Observers (the practice screen)
 *
 * Lifecycle: start -> keystrokes/ticks -> completed | timed_out | aborted
 */
export class SessionManager {
  private readonly _matcher = new TypingMatcher();
  private _active: ActiveSession | null = null;
  private _observers: SessionObserver[] = [];
  private _loading: AbortController | null = null;
  private _completionPending = false;
  private readonly _subscriptions: Disposable[];

  constructor(
    private readonly _resolver: CodeResolver,
    private readonly _logger: Logger,
    private readonly _timer: CountdownTimer = new CountdownTimer(),
  ) {
    this._subscriptions = [
      this._matcher.onKeystroke((outcome) => {
        if (this._active) {
          this._active.lastOutcome = outcome;
        }
      }),
      this._matcher.onComplete(() => {
        this._completionPending = true;
      }),
      this._timer.onTick(() => {
        const snapshot = this.getSnapshot();
        if (snapshot) {
          this._notify((o) => o.onTick?.(snapshot));
        }
      }),
      this._timer.onExpired(() => {
        this._end("timed_out");
      }),
    ];
  }

  addObserver(observer: SessionObserver): Disposable {
    this._observers.push(observer);
    return { dispose: () => { this._observers = this._observers.filter((o) => o !== observer); } };
  }

  /**
   * Start a new practice session.
   *
   * Any running session is aborted first. Keystrokes that arrive while
   * code is being resolved are ignored.
   *
   * @returns The first snapshot, or null if the start was superseded by
   *          another start or an abort while loading.
   */
  async startSession(language: LanguageId, durationSeconds: number): Promise<SessionSnapshot | null> {
    if (this._active) {
      this._end("aborted");
    }
    this._loading?.abort();

    const loading = new AbortController();
    this._loading = loading;
    this._notify((o) => o.onLoading?.(language));

    let resolved: ResolvedCode;
    try {
      resolved = await this._resolver.resolve(language, loading.signal);
    } finally {
      if (this._loading === loading) {
        this._loading = null;
      }
    }
    if (loading.signal.aborted) {
      this._logger.info("[SessionManager] Start superseded while loading code");
      return null;
    }

    if (resolved.warning) {
      const warning = resolved.warning;
      this._notify((o) => o.onWarning?.(warning));
    }

    this._matcher.setTarget(resolved.code);
    this._completionPending = false;
    this._active = {
      language,
      durationSeconds,
      usedFallback: resolved.origin === "fallback",
      startedAt: new Date().toISOString(),
      lastOutcome: null,
    };
    this._timer.start(durationSeconds);

    this._logger.info(
      `[SessionManager] Session started: ${language}, ${this._matcher.targetLength} chars, ${durationSeconds}s, ${resolved.origin}`,
    );

    const snapshot = this._requireSnapshot();
    this._notify((o) => o.onSessionStarted?.(snapshot, resolved));

    if (this._matcher.state === "complete") {
      this._end("completed");
    }
    return snapshot;
  }

  /** Evaluate one logical character against the active session. */
  handleInput(char: string): KeystrokeOutcome | null {
    if (!this._active) { return null; }

    const outcome = this._matcher.input(char);
    if (!outcome) { return null; }

    const snapshot = this._requireSnapshot();
    this._notify((o) => o.onProgress?.(outcome, snapshot));

    if (this._completionPending) {
      this._end("completed");
    }
    return outcome;
  }

  /** Normalize a raw key event, then evaluate it. */
  handleKey(event: RawKeyEvent): KeystrokeOutcome | null {
    const char = toLogicalChar(event);
    return char === null ? null : this.handleInput(char);
  }

  /** End the running session (or cancel loading) as aborted. */
  abort(): SessionResult | null {
    if (this._loading) {
      this._loading.abort();
      this._loading = null;
    }
    return this._active ? this._end("aborted") : null;
  }

  getSnapshot(): SessionSnapshot | null {
    const session = this._active;
    if (!session) { return null; }

    const counters = {
      position: this._matcher.position,
      targetLength: this._matcher.targetLength,
      errorCount: this._matcher.errorCount,
      totalKeystrokes: this._matcher.totalKeystrokes,
    };
    return {
      language: session.language,
      state: this._matcher.state,
      target: this._matcher.target,
      typed: this._matcher.typed,
      ...counters,
      durationSeconds: session.durationSeconds,
      remainingSeconds: this._timer.remainingSeconds,
      elapsedSeconds: this._timer.elapsedSeconds,
      phase: this._timer.getPhase(),
      progress: progressPercentage(counters),
      accuracy: accuracyPercentage(counters),
      wpm: wordsPerMinute(counters.position, this._timer.elapsedSeconds),
      lastOutcome: session.lastOutcome,
    };
  }

  get hasActiveSession(): boolean {
    return this._active !== null;
  }

  dispose(): void {
    this.abort();
    for (const s of this._subscriptions) {
      s.dispose();
    }
    this._observers = [];
  }

  // ---- internal ----

  private _end(outcome: SessionOutcome): SessionResult | null {
    const session = this._active;
    const snapshot = this.getSnapshot();
    if (!session || !snapshot) { return null; }

    const { elapsedSeconds } = this._timer.stop();
    const result: SessionResult = {
      outcome,
      language: session.language,
      accuracy: snapshot.accuracy,
      wpm: wordsPerMinute(snapshot.position, elapsedSeconds),
      progress: snapshot.progress,
      elapsedSeconds,
      errorCount: snapshot.errorCount,
      totalKeystrokes: snapshot.totalKeystrokes,
      position: snapshot.position,
      targetLength: snapshot.targetLength,
      usedFallback: session.usedFallback,
    };

    this._active = null;
    this._completionPending = false;
    this._matcher.clear();

    this._logger.info(`[SessionManager] Session ended: ${outcome}`, {
      accuracy: Number(result.accuracy.toFixed(1)),
      wpm: Number(result.wpm.toFixed(1)),
      progress: Number(result.progress.toFixed(1)),
    });
    this._notify((o) => o.onSessionEnded?.(result));
    return result;
  }

  private _requireSnapshot(): SessionSnapshot {
    const snapshot = this.getSnapshot();
    if (!snapshot) {
      throw new Error("No active session");
    }
    return snapshot;
  }

  private _notify(fn: (observer: SessionObserver) => void): void {
    for (const observer of [...this._observers]) {
      fn(observer);
    }
  }
}
