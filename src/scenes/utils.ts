/**
 * Terminal glue shared by scenes
 *
 * Escape sequences, the scoped guard around alternate screen / raw mode,
 * and the non-blocking key and size sources the animation loop polls.
 */

import type { Terminal } from '@xterm/xterm';

// ============================================================================
// Escape Sequences
// ============================================================================

export const ALT_SCREEN_ON = '\x1b[?1049h';
export const ALT_SCREEN_OFF = '\x1b[?1049l';
export const CURSOR_HIDE = '\x1b[?25l';
export const CURSOR_SHOW = '\x1b[?25h';
export const CLEAR_SCREEN = '\x1b[2J';
export const CURSOR_HOME = '\x1b[H';
export const RESET_COLOR = '\x1b[0m';

/** Where a scene writes its frames */
export type OutputTerminal = Pick<Terminal, 'write'>;

/** Host terminal a show can run in: xterm.js, or the Node adapter in cli.ts */
export type ShowTerminal = Pick<Terminal, 'write' | 'cols' | 'rows' | 'onData'>;

// ============================================================================
// Terminal Guard
// ============================================================================

/**
 * Process-wide terminal mode switch (raw / cbreak input), when the host has
 * one. xterm.js in a browser has none.
 */
export interface RawModeControl {
  enter: () => void;
  restore: () => void;
}

export interface TerminalGuard {
  /** Enter alternate screen, hide cursor, clear, enter raw mode */
  acquire: () => void;
  /** Undo everything acquire() did. Safe to call any number of times. */
  release: () => void;
  readonly isAcquired: boolean;
}

/**
 * Scoped ownership of the terminal's modes. Acquired once when a show starts
 * and released on every exit path; release never throws.
 */
export function createTerminalGuard(terminal: OutputTerminal, rawMode?: RawModeControl): TerminalGuard {
  let acquired = false;

  return {
    acquire: () => {
      if (acquired) {
        console.warn('[TerminalGuard] Already acquired');
        return;
      }
      // Marked first so a release() after a half-finished acquire still restores
      acquired = true;
      rawMode?.enter();
      terminal.write(ALT_SCREEN_ON + CURSOR_HIDE + CLEAR_SCREEN + CURSOR_HOME);
    },
    release: () => {
      if (!acquired) return;
      acquired = false;

      try {
        terminal.write(RESET_COLOR + CURSOR_SHOW + ALT_SCREEN_OFF);
      } catch (err) {
        console.warn('[TerminalGuard] Failed to restore screen:', err);
      }
      try {
        rawMode?.restore();
      } catch (err) {
        console.warn('[TerminalGuard] Failed to restore input mode:', err);
      }
    },
    get isAcquired() {
      return acquired;
    },
  };
}

// ============================================================================
// Input and Size Sources
// ============================================================================

/** Yields at most one key per poll, never blocks */
export interface KeySource {
  poll: () => string | null;
}

export interface QueuedKeySource extends KeySource {
  push: (data: string) => void;
  readonly pending: number;
}

/**
 * Key source fed by terminal data events. Multi-character chunks (pasted
 * text) are split into single characters; escape sequences stay whole.
 */
export function createQueuedKeySource(): QueuedKeySource {
  const queue: string[] = [];

  return {
    push: (data: string) => {
      if (data.startsWith('\x1b')) {
        queue.push(data);
        return;
      }
      for (const char of data) queue.push(char);
    },
    poll: () => queue.shift() ?? null,
    get pending() {
      return queue.length;
    },
  };
}

export interface TerminalSize {
  cols: number;
  rows: number;
}

export interface SizeSource {
  size: () => TerminalSize;
}

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { cols: 80, rows: 24 };

/**
 * Reads cols/rows from the terminal, falling back to the last good size
 * (or 80x24 before the first) when the query throws or returns garbage.
 */
export function createSizeSource(terminal: Pick<Terminal, 'cols' | 'rows'>): SizeSource {
  let last = DEFAULT_TERMINAL_SIZE;

  return {
    size: () => {
      try {
        const { cols, rows } = terminal;
        if (Number.isFinite(cols) && Number.isFinite(rows) && cols > 0 && rows > 0) {
          last = { cols, rows };
        }
      } catch {
        // keep the last known size
      }
      return last;
    },
  };
}

/**
 * Sleep helper. Aborting the signal resolves early and clears the timer.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
