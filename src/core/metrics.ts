/** Standard word length for WPM. */
export const CHARS_PER_WORD = 5;

export interface TypingCounters {
  position: number;
  targetLength: number;
  errorCount: number;
  totalKeystrokes: number;
}

export function progressPercentage(counters: Pick<TypingCounters, "position" | "targetLength">): number {
  if (counters.targetLength === 0) { return 0; }
  return (100 * counters.position) / counters.targetLength;
}

export function accuracyPercentage(counters: Pick<TypingCounters, "errorCount" | "totalKeystrokes">): number {
  if (counters.totalKeystrokes === 0) { return 100; }
  return 100 - (100 * counters.errorCount) / counters.totalKeystrokes;
}

/** Counts correctly typed characters only, not raw keystrokes. */
export function wordsPerMinute(position: number, elapsedSeconds: number): number {
  if (elapsedSeconds <= 0) { return 0; }
  return position / CHARS_PER_WORD / (elapsedSeconds / 60);
}

/** MM:SS */
export function formatClock(totalSeconds: number): string {
  const clamped = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(clamped / 60);
  const seconds = clamped % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}
