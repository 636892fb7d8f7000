import type { ResolvedCode } from "../core/code-source";
import { LANGUAGES, type LanguageId } from "../core/languages";
import type { KeystrokeOutcome } from "../core/typing-matcher";
import type {
  SessionObserver,
  SessionResult,
  SessionSnapshot,
} from "../core/session-manager";
import { ANSI, renderCode, renderResults, renderStatusLine } from "./render";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";
const MIN_VIEWPORT_LINES = 5;
/** Rows used by header, status, blank lines and footer. */
const CHROME_ROWS = 7;

/** The part of a TTY write stream the view needs. */
export interface ScreenOutput {
  write(text: string): boolean;
  rows?: number;
}

export interface TerminalViewOptions {
  color: boolean;
}

/**
 * Terminal View
 *
 * Practice screen for the CLI. Redraws the whole screen on every session
 * event; reads snapshots and never touches session state.
 */
export class TerminalView implements SessionObserver {
  private _warning: string | null = null;
  private _origin: ResolvedCode["origin"] | null = null;

  constructor(
    private readonly _output: ScreenOutput,
    private readonly _options: TerminalViewOptions,
  ) {}

  onLoading(language: LanguageId): void {
    this._warning = null;
    this._write([`Generating ${LANGUAGES[language].displayName} code...`]);
  }

  onSessionStarted(snapshot: SessionSnapshot, code: ResolvedCode): void {
    this._origin = code.origin;
    this._draw(snapshot);
  }

  onProgress(_outcome: KeystrokeOutcome, snapshot: SessionSnapshot): void {
    this._draw(snapshot);
  }

  onTick(snapshot: SessionSnapshot): void {
    this._draw(snapshot);
  }

  onWarning(message: string): void {
    this._warning = message;
  }

  onSessionEnded(result: SessionResult): void {
    this._write([
      ...renderResults(result),
      "",
      "Press Enter to play again, Esc or Ctrl+C to quit.",
    ]);
  }

  private _draw(snapshot: SessionSnapshot): void {
    const rows = this._output.rows ?? 24;
    const viewportLines = Math.max(MIN_VIEWPORT_LINES, rows - CHROME_ROWS - (this._warning ? 1 : 0));
    const title = `codetype -- ${LANGUAGES[snapshot.language].displayName}${this._origin === "fallback" ? " (sample)" : ""}`;

    const lines = [
      this._options.color ? `${ANSI.bold}${title}${ANSI.reset}` : title,
      renderStatusLine(snapshot, this._options.color),
    ];
    if (this._warning) {
      lines.push(this._options.color ? `${ANSI.yellow}${this._warning.split("\n")[0]}${ANSI.reset}` : this._warning.split("\n")[0]);
    }
    lines.push("", ...renderCode(snapshot, { color: this._options.color, viewportLines }), "", "Esc: end run  Ctrl+C: quit");
    this._write(lines);
  }

  private _write(lines: string[]): void {
    this._output.write(CLEAR_SCREEN + lines.join("\n") + "\n");
  }
}
