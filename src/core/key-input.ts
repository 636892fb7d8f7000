/**
 * Raw key event, shaped like the `key` argument of a node:readline
 * "keypress" event.
 */
export interface RawKeyEvent {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

const NEWLINE_KEYS = new Set(["return", "enter"]);

/**
 * Map a raw key event to the logical character it types.
 * Returns null for events that are not evaluated (modifier chords,
 * navigation and other control keys).
 */
export function toLogicalChar(event: RawKeyEvent): string | null {
  if (event.name && NEWLINE_KEYS.has(event.name)) {
    return "\n";
  }
  if (event.ctrl || event.meta) {
    return null;
  }
  if (event.name === "tab") {
    // Shift+Tab arrives as name "tab" with sequence "\x1b[Z".
    return event.shift ? null : "\t";
  }

  const sequence = event.sequence ?? "";
  const codePoints = Array.from(sequence);
  if (codePoints.length !== 1) {
    return null;
  }
  return isPrintable(codePoints[0]) ? codePoints[0] : null;
}

function isPrintable(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f && !(code >= 0x80 && code < 0xa0);
}

/** Where the practice loop is when a key arrives. */
export type LoopPhase = "loading" | "running" | "results";

export type KeyAction = "quit" | "abort" | "restart" | "type" | "ignore";

/**
 * Decide what a key does in the practice loop. Ctrl+C always quits.
 * Esc ends a running session, and quits from loading or results.
 * Enter on the results screen starts another run. While code is
 * loading every other key is ignored.
 */
export function routeKey(event: RawKeyEvent, phase: LoopPhase): KeyAction {
  if (event.ctrl && event.name === "c") {
    return "quit";
  }
  const isEscape = event.name === "escape";

  switch (phase) {
    case "loading":
      return isEscape ? "quit" : "ignore";
    case "running":
      return isEscape ? "abort" : "type";
    case "results":
      if (isEscape) { return "quit"; }
      return event.name !== undefined && NEWLINE_KEYS.has(event.name) ? "restart" : "ignore";
  }
}
