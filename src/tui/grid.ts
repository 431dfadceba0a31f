// Fixed-size character grid the renderer draws into. One code point per cell.

import type { ColorName } from './constants.js';

export interface CellStyle {
  fg: ColorName | null;
  bold: boolean;
  dim: boolean;
  inverse: boolean;
}

export interface Cell {
  char: string;
  style: CellStyle;
}

/** A run of same-styled text within one row */
export interface StyleRun {
  text: string;
  style: CellStyle;
}

export const PLAIN: CellStyle = Object.freeze({ fg: null, bold: false, dim: false, inverse: false });

export function style(partial: Partial<CellStyle>): CellStyle {
  return { ...PLAIN, ...partial };
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.fg === b.fg && a.bold === b.bold && a.dim === b.dim && a.inverse === b.inverse;
}

export class CellGrid {
  private readonly cells: Cell[][];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid grid size ${width}x${height}`);
    }
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, () => ({ char: ' ', style: PLAIN })),
    );
  }

  /**
   * Write text starting at (x, y), clipped to the grid. Returns the column after the text.
   */
  put(x: number, y: number, text: string, cellStyle: CellStyle = PLAIN): number {
    if (y < 0 || y >= this.height) return x;
    let col = x;
    for (const char of Array.from(text)) {
      if (col >= this.width) break;
      if (col >= 0) {
        this.cells[y][col] = { char, style: cellStyle };
      }
      col++;
    }
    return col;
  }

  /** Change the style of one existing cell */
  restyle(x: number, y: number, cellStyle: CellStyle): void {
    if (y < 0 || y >= this.height || x < 0 || x >= this.width) return;
    this.cells[y][x] = { char: this.cells[y][x].char, style: cellStyle };
  }

  cellAt(x: number, y: number): Cell {
    const cell = this.cells[y]?.[x];
    if (!cell) {
      throw new Error(`Cell (${x}, ${y}) outside ${this.width}x${this.height} grid`);
    }
    return cell;
  }

  /** Row text with trailing spaces removed */
  rowText(y: number): string {
    return this.cells[y].map((c) => c.char).join('').trimEnd();
  }

  /** Whole grid as text, one line per row, trailing blank rows kept */
  toText(): string {
    return Array.from({ length: this.height }, (_, y) => this.rowText(y)).join('\n');
  }

  styleRuns(y: number): StyleRun[] {
    const runs: StyleRun[] = [];
    for (const cell of this.cells[y]) {
      const last = runs[runs.length - 1];
      if (last && sameStyle(last.style, cell.style)) {
        last.text += cell.char;
      } else {
        runs.push({ text: cell.char, style: cell.style });
      }
    }
    return runs;
  }
}
