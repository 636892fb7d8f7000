import { InvalidPositionError } from "./errors";

/**
 * Target Buffer
 *
 * Holds the fixed text for one session and the caret within it.
 * Characters are code points, so a surrogate pair counts once.
 */
export class TargetBuffer {
  private _chars: string[] = [];
  private _position = 0;
  private _hasTarget = false;

  get hasTarget(): boolean { return this._hasTarget; }
  get length(): number { return this._chars.length; }
  get position(): number { return this._position; }
  get isComplete(): boolean { return this._hasTarget && this._position === this._chars.length; }

  get text(): string {
    return this._chars.join("");
  }

  /** Correctly typed prefix. Nothing else is ever appended to it. */
  get typed(): string {
    return this._chars.slice(0, this._position).join("");
  }

  setTarget(text: string): void {
    this._chars = Array.from(text);
    this._position = 0;
    this._hasTarget = true;
  }

  clear(): void {
    this._chars = [];
    this._position = 0;
    this._hasTarget = false;
  }

  expectedChar(position: number): string {
    if (!Number.isInteger(position) || position < 0 || position >= this._chars.length) {
      throw new InvalidPositionError(position, this._chars.length);
    }
    return this._chars[position];
  }

  advance(): void {
    if (this._position >= this._chars.length) {
      throw new InvalidPositionError(this._position + 1, this._chars.length);
    }
    this._position++;
  }
}
