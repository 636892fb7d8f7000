import type { ModelInfo } from "../ai/providers/types";
import type { SessionResult, SessionSnapshot } from "../core/session-manager";
import { LANGUAGES } from "../core/languages";
import { formatClock } from "../core/metrics";
import type { TimerPhase } from "../core/timer";

const ESC = "\x1b[";

export const ANSI = {
  reset: `${ESC}0m`,
  bold: `${ESC}1m`,
  dim: `${ESC}2m`,
  inverse: `${ESC}7m`,
  green: `${ESC}32m`,
  yellow: `${ESC}33m`,
  red: `${ESC}31m`,
  errorCaret: `${ESC}41;97m`,
} as const;

export const NEWLINE_GLYPH = "↵";
const TAB_WIDTH = 4;

type CharStyle = "typed" | "caret" | "error" | "pending";

const STYLE_CODES: Record<CharStyle, string> = {
  typed: ANSI.green,
  caret: ANSI.inverse,
  error: ANSI.errorCaret,
  pending: ANSI.dim,
};

const PHASE_CODES: Record<TimerPhase, string> = {
  green: ANSI.green,
  yellow: ANSI.yellow,
  red: ANSI.red,
};

export interface RenderOptions {
  color: boolean;
  /** Lines of code shown at once. */
  viewportLines: number;
}

function paint(text: string, code: string, color: boolean): string {
  return color && text ? `${code}${text}${ANSI.reset}` : text;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function renderStatusLine(snapshot: SessionSnapshot, color = false): string {
  const time = paint(`Time ${formatClock(snapshot.remainingSeconds)}`, PHASE_CODES[snapshot.phase], color);
  return [
    time,
    `Progress ${Math.floor(snapshot.progress)}%`,
    `Accuracy ${formatPercent(snapshot.accuracy)}`,
    `WPM ${snapshot.wpm.toFixed(1)}`,
  ].join(" | ");
}

/**
 * Render the target as screen lines: typed text, the caret (red when
 * the last keystroke there was wrong) and the pending rest. A caret on
 * a line break shows as a return glyph.
 */
export function renderCode(snapshot: SessionSnapshot, options: RenderOptions): string[] {
  const chars = Array.from(snapshot.target);
  const wrongAtCaret = snapshot.lastOutcome !== null
    && !snapshot.lastOutcome.isCorrect
    && snapshot.lastOutcome.position === snapshot.position;

  const lines: string[] = [];
  let line = "";
  let run = "";
  let runStyle: CharStyle | null = null;

  const flush = (): void => {
    if (runStyle !== null) {
      line += paint(run, STYLE_CODES[runStyle], options.color);
    }
    run = "";
    runStyle = null;
  };
  const append = (text: string, style: CharStyle): void => {
    if (style !== runStyle) {
      flush();
      runStyle = style;
    }
    run += text;
  };

  chars.forEach((char, i) => {
    const style: CharStyle = i < snapshot.position
      ? "typed"
      : i === snapshot.position ? (wrongAtCaret ? "error" : "caret") : "pending";

    if (char === "\n") {
      if (i === snapshot.position) {
        append(NEWLINE_GLYPH, style);
      }
      flush();
      lines.push(line);
      line = "";
      return;
    }
    append(char === "\t" ? " ".repeat(TAB_WIDTH) : char, style);
  });
  flush();
  lines.push(line);

  const caretLine = chars.slice(0, snapshot.position).filter((c) => c === "\n").length;
  const start = Math.max(0, Math.min(caretLine - Math.floor(options.viewportLines / 3), lines.length - options.viewportLines));
  return lines.slice(start, start + options.viewportLines);
}

export function renderResults(result: SessionResult): string[] {
  const headline = result.outcome === "completed"
    ? "Congratulations! You completed the typing exercise."
    : result.outcome === "timed_out" ? "Time's up!" : "Session aborted.";

  const lines = [
    headline,
    "",
    `Language: ${LANGUAGES[result.language].displayName}`,
    `Accuracy: ${formatPercent(result.accuracy)}`,
    `Speed: ${result.wpm.toFixed(1)} WPM`,
    `Progress: ${formatPercent(result.progress)}`,
    `Keystrokes: ${result.totalKeystrokes} (${result.errorCount} errors)`,
    `Time: ${formatClock(result.elapsedSeconds)}`,
  ];
  if (result.usedFallback) {
    lines.push("(built-in sample code)");
  }
  return lines;
}

/** `--list-models` output: one tab-separated row per model. */
export function formatModelList(models: readonly ModelInfo[]): string {
  if (models.length === 0) {
    return "No models available. Practice runs on built-in samples.";
  }
  return models
    .map((m) => [m.id, m.provider, m.isLocal ? "local" : "remote", m.description ?? ""].join("\t").trimEnd())
    .join("\n");
}
