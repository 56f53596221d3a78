/**
 * CLI Progress Display
 *
 * Shows the current step of a running task next to an animated spinner.
 */

import type { Observable } from "rxjs";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/** The part of a writable stream the display needs */
export interface ProgressStream {
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  label: string;
  stream?: ProgressStream;
  intervalMs?: number;
  now?: () => number;
}

/**
 * Subscribe to `source`, showing `describe(value)` as the current step,
 * and resolve with the last value it emitted.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  describe: (value: T) => string,
  options: ProgressOptions
): Promise<T | undefined> {
  const {
    label,
    stream = process.stderr,
    intervalMs = 80,
    now = Date.now,
  } = options;

  const startTime = now();
  let step = "starting";
  let frame = 0;
  let last: T | undefined;

  function render(spinner: string) {
    const elapsed = formatDuration(now() - startTime);
    stream.write(`\r${CLEAR_LINE}${spinner} ${label}  ${step}  ${elapsed}`);
  }

  return new Promise<T | undefined>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, intervalMs);

    source.subscribe({
      next(value) {
        last = value;
        step = describe(value);
      },
      error(err) {
        clearInterval(timer);
        const message = err instanceof Error ? err.message : String(err);
        stream.write(`\r${CLEAR_LINE}✗ ${label}  ${message}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        const elapsed = formatDuration(now() - startTime);
        stream.write(`\r${CLEAR_LINE}✔ ${label}  ${step}  ${elapsed}\n`);
        resolve(last);
      },
    });
  });
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
