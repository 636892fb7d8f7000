import { TargetBuffer } from "./target-buffer";
import type { Disposable } from "./timer";

export type MatcherState = "idle" | "in_progress" | "complete";

/** Result of evaluating one logical character. */
export interface KeystrokeOutcome {
  /** Caret position the keystroke was evaluated at. */
  position: number;
  isCorrect: boolean;
  typed: string;
  expected: string;
}

/**
 * Typing Matcher
 *
 * State machine over the caret of a TargetBuffer:
 *   idle        -- no target set, input ignored
 *   in_progress -- 0 <= position < length
 *   complete    -- position == length, input ignored
 *
 * Every evaluated keystroke is reported to keystroke listeners, wrong or
 * not. The caret only moves on an exact match, so a wrong keystroke never
 * enters the typed prefix. Enter arrives here already normalized to "\n"
 * and goes through the same path as any other character.
 */
export class TypingMatcher {
  private readonly _buffer = new TargetBuffer();
  private _errorCount = 0;
  private _totalKeystrokes = 0;

  private _keystrokeCallbacks: Array<(outcome: KeystrokeOutcome) => void> = [];
  private _completeCallbacks: Array<() => void> = [];

  get state(): MatcherState {
    if (!this._buffer.hasTarget) { return "idle"; }
    if (this._buffer.isComplete) { return "complete"; }
    return "in_progress";
  }

  get position(): number { return this._buffer.position; }
  get errorCount(): number { return this._errorCount; }
  get totalKeystrokes(): number { return this._totalKeystrokes; }
  get targetLength(): number { return this._buffer.length; }
  get target(): string { return this._buffer.text; }
  get typed(): string { return this._buffer.typed; }

  /** Replace the target and zero every counter. */
  setTarget(text: string): void {
    this._buffer.setTarget(text);
    this._errorCount = 0;
    this._totalKeystrokes = 0;
  }

  /** Drop the target and go back to idle. */
  clear(): void {
    this._buffer.clear();
    this._errorCount = 0;
    this._totalKeystrokes = 0;
  }

  /**
   * Evaluate one logical character.
   * Returns null when the input was ignored (idle or complete).
   */
  input(char: string): KeystrokeOutcome | null {
    if (this.state !== "in_progress") { return null; }

    const position = this._buffer.position;
    const expected = this._buffer.expectedChar(position);

    this._totalKeystrokes++;
    const isCorrect = char === expected;
    if (!isCorrect) {
      this._errorCount++;
    }

    const outcome: KeystrokeOutcome = { position, isCorrect, typed: char, expected };
    for (const cb of this._keystrokeCallbacks) {
      cb(outcome);
    }

    if (isCorrect) {
      this._buffer.advance();
      if (this._buffer.isComplete) {
        for (const cb of this._completeCallbacks) {
          cb();
        }
      }
    }

    return outcome;
  }

  onKeystroke(callback: (outcome: KeystrokeOutcome) => void): Disposable {
    this._keystrokeCallbacks.push(callback);
    return { dispose: () => { this._keystrokeCallbacks = this._keystrokeCallbacks.filter((c) => c !== callback); } };
  }

  onComplete(callback: () => void): Disposable {
    this._completeCallbacks.push(callback);
    return { dispose: () => { this._completeCallbacks = this._completeCallbacks.filter((c) => c !== callback); } };
  }
}
