/**
 * Frame Buffer
 *
 * A grid of (glyph, color) cells that scenes draw into every frame, and a
 * serializer that only emits an escape sequence where the color changes.
 * Drawing cost is O(cells); escape volume is O(color transitions).
 */

import { type Color, type RgbColor, DEFAULT_COLOR, colorsEqual } from './color';

// ============================================================================
// TYPES
// ============================================================================

export interface Cell {
  char: string;
  color: Color;
}

export type DrawInstruction =
  | { op: 'color'; color: RgbColor }
  | { op: 'text'; text: string }
  | { op: 'reset' }
  | { op: 'newline' };

export interface AnsiOptions {
  /** No escapes at all: colors and resets are dropped */
  plain?: boolean;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const MIN_BUFFER_WIDTH = 20;
export const MIN_BUFFER_HEIGHT = 10;

const BLANK = ' ';

export const SGR_RESET = '\x1b[0m';

// ============================================================================
// BUFFER
// ============================================================================

export class FrameBuffer {
  private cells: Cell[][] = [];
  private _width = 0;
  private _height = 0;

  constructor(width: number, height: number) {
    this.resize(width, height);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /**
   * Reallocate the grid. Contents are discarded; dimensions are floored at
   * MIN_BUFFER_WIDTH x MIN_BUFFER_HEIGHT.
   */
  resize(width: number, height: number): void {
    this._width = Math.max(MIN_BUFFER_WIDTH, Math.floor(Number.isFinite(width) ? width : 0));
    this._height = Math.max(MIN_BUFFER_HEIGHT, Math.floor(Number.isFinite(height) ? height : 0));
    this.cells = [];
    for (let y = 0; y < this._height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this._width; x++) {
        row.push({ char: BLANK, color: DEFAULT_COLOR });
      }
      this.cells.push(row);
    }
  }

  clear(): void {
    for (const row of this.cells) {
      for (const cell of row) {
        cell.char = BLANK;
        cell.color = DEFAULT_COLOR;
      }
    }
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y)
      && x >= 0 && x < this._width
      && y >= 0 && y < this._height;
  }

  /**
   * Write one cell. Out-of-range or non-integer coordinates are ignored.
   */
  put(x: number, y: number, char: string, color: Color = DEFAULT_COLOR): void {
    if (!this.inBounds(x, y)) return;
    const cell = this.cells[y][x];
    cell.char = char;
    cell.color = color;
  }

  /**
   * Write a string left to right starting at (x, y), one code point per
   * cell. Whatever falls outside the grid is clipped.
   */
  putText(x: number, y: number, text: string, color: Color = DEFAULT_COLOR): void {
    let col = x;
    for (const char of text) {
      this.put(col, y, char, color);
      col++;
    }
  }

  get(x: number, y: number): Cell | undefined {
    if (!this.inBounds(x, y)) return undefined;
    const { char, color } = this.cells[y][x];
    return { char, color };
  }

  /**
   * Scan rows top to bottom, columns left to right. Glyphs sharing a color
   * are coalesced into one text run; a color instruction is emitted only
   * when the color differs from the previous cell on the same row.
   */
  render(): DrawInstruction[] {
    const out: DrawInstruction[] = [];

    for (let y = 0; y < this._height; y++) {
      if (y > 0) out.push({ op: 'newline' });

      let current: Color = DEFAULT_COLOR;
      let run = '';

      for (const cell of this.cells[y]) {
        if (!colorsEqual(cell.color, current)) {
          if (run) out.push({ op: 'text', text: run });
          run = '';
          out.push(cell.color.kind === 'rgb' ? { op: 'color', color: cell.color } : { op: 'reset' });
          current = cell.color;
        }
        run += cell.char;
      }

      if (run) out.push({ op: 'text', text: run });
      if (current.kind === 'rgb') out.push({ op: 'reset' });
    }

    out.push({ op: 'reset' });
    return out;
  }
}

// ============================================================================
// SERIALIZATION
// ============================================================================

export function sgrColor(color: RgbColor): string {
  return `\x1b[38;2;${color.r};${color.g};${color.b}m`;
}

/**
 * Turn draw instructions into a terminal string. Rows are separated by
 * CR LF, so the caller positions the cursor at home first.
 */
export function toAnsi(instructions: readonly DrawInstruction[], options: AnsiOptions = {}): string {
  let output = '';
  for (const ins of instructions) {
    switch (ins.op) {
      case 'color':
        if (!options.plain) output += sgrColor(ins.color);
        break;
      case 'text':
        output += ins.text;
        break;
      case 'reset':
        if (!options.plain) output += SGR_RESET;
        break;
      case 'newline':
        output += '\r\n';
        break;
    }
  }
  return output;
}

/** Instructions that turn into escape sequences (color changes and resets) */
export function countEscapes(instructions: readonly DrawInstruction[]): number {
  return instructions.filter(ins => ins.op === 'color' || ins.op === 'reset').length;
}
