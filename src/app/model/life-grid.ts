import { createHash } from 'node:crypto';
import { requirePositiveInteger } from './errors';

export interface Cell {
  row: number;
  col: number;
}

/**
 * Fixed-size Conway grid. Cells live in a flat row-major buffer; `step()`
 * writes the next generation into a second buffer and swaps, so neighbor counts
 * are always taken from the pre-step generation.
 *
 * With `toroidal` set, every coordinate wraps (negative ones included).
 * Otherwise coordinates outside the grid read as dead and writes to them are
 * ignored. On toroidal grids with 1 or 2 rows (or columns) a neighborhood can
 * reach the same cell twice and count it twice; that follows from the plain
 * modulo rule and is left as is.
 */
export class LifeGrid {
  readonly rows: number;
  readonly cols: number;
  toroidal: boolean;

  private cells: Uint8Array;
  private next: Uint8Array;

  constructor(rows: number, cols: number, toroidal: boolean = true) {
    this.rows = requirePositiveInteger('rows', rows);
    this.cols = requirePositiveInteger('cols', cols);
    this.toroidal = toroidal;
    this.cells = new Uint8Array(rows * cols);
    this.next = new Uint8Array(rows * cols);
  }

  get size() {
    return this.rows * this.cols;
  }

  inBounds(row: number, col: number) {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  get(row: number, col: number): boolean {
    const index = this.indexOf(row, col);
    return index >= 0 && this.cells[index] === 1;
  }

  set(row: number, col: number, alive: boolean) {
    const index = this.indexOf(row, col);
    if (index < 0) return;
    this.cells[index] = alive ? 1 : 0;
  }

  toggle(row: number, col: number) {
    const index = this.indexOf(row, col);
    if (index < 0) return;
    this.cells[index] = this.cells[index] === 1 ? 0 : 1;
  }

  clear() {
    this.cells.fill(0);
  }

  *aliveCells(): IterableIterator<Cell> {
    for (let row = 0; row < this.rows; row++) {
      const offset = row * this.cols;
      for (let col = 0; col < this.cols; col++) {
        if (this.cells[offset + col] === 1) {
          yield { row, col };
        }
      }
    }
  }

  population() {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      count += this.cells[i];
    }
    return count;
  }

  isEmpty() {
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === 1) return false;
    }
    return true;
  }

  neighborCount(row: number, col: number) {
    let count = 0;
    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        if (dr === 0 && dc === 0) continue;
        if (this.get(row + dr, col + dc)) count++;
      }
    }
    return count;
  }

  step() {
    for (let row = 0; row < this.rows; row++) {
      const offset = row * this.cols;
      for (let col = 0; col < this.cols; col++) {
        const neighbors = this.neighborCount(row, col);
        const alive = this.cells[offset + col] === 1;
        this.next[offset + col] = neighbors === 3 || (alive && neighbors === 2) ? 1 : 0;
      }
    }
    const previous = this.cells;
    this.cells = this.next;
    this.next = previous;
  }

  /**
   * SHA-256 (hex) of the cells packed one bit each, row-major, most significant
   * bit first; the last partial byte is zero-padded on the low end.
   *
   * Used as an equality witness between generations. Equal grids always hash
   * equal; different grids collide only with negligible (but non-zero)
   * probability.
   */
  stateHash(): string {
    return createHash('sha256').update(this.packBits()).digest('hex');
  }

  packBits(): Uint8Array {
    const packed = new Uint8Array(Math.ceil(this.cells.length / 8));
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === 1) {
        packed[i >> 3] |= 0x80 >> (i & 7);
      }
    }
    return packed;
  }

  clone() {
    const copy = new LifeGrid(this.rows, this.cols, this.toroidal);
    copy.cells.set(this.cells);
    return copy;
  }

  equals(other: LifeGrid) {
    if (other.rows !== this.rows || other.cols !== this.cols) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  private indexOf(row: number, col: number) {
    if (this.toroidal) {
      return wrap(row, this.rows) * this.cols + wrap(col, this.cols);
    }
    if (!this.inBounds(row, col)) return -1;
    return row * this.cols + col;
  }
}

export function wrap(value: number, size: number) {
  return ((value % size) + size) % size;
}

/**
 * Builds a new grid of the requested size and copies the centered overlap of
 * `source` into its center. `source` is left untouched.
 */
export function resizeGrid(source: LifeGrid, rows: number, cols: number, toroidal: boolean = source.toroidal) {
  const target = new LifeGrid(rows, cols, toroidal);
  const copyRows = Math.min(source.rows, rows);
  const copyCols = Math.min(source.cols, cols);
  const sourceRow = (source.rows - copyRows) >> 1;
  const sourceCol = (source.cols - copyCols) >> 1;
  const targetRow = (rows - copyRows) >> 1;
  const targetCol = (cols - copyCols) >> 1;

  for (let r = 0; r < copyRows; r++) {
    for (let c = 0; c < copyCols; c++) {
      if (source.get(sourceRow + r, sourceCol + c)) {
        target.set(targetRow + r, targetCol + c, true);
      }
    }
  }
  return target;
}
