/**
 * Glyph Pattern: the set of "on" cells in a normalized SCALE_SIZE × SCALE_SIZE grid.
 */

/** Side length of the normalized grid every glyph is resampled to. */
export const SCALE_SIZE = 9;

export interface Cell {
  readonly x: number;
  readonly y: number;
}

function compareCells(a: Cell, b: Cell): number {
  return a.y - b.y || a.x - b.x;
}

export function isCellInRange(x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < SCALE_SIZE && y < SCALE_SIZE;
}

/**
 * Immutable cell set. Two patterns are equal iff their cell sets are equal;
 * `key` is the canonical form used for that comparison and for dictionary lookup.
 */
export class GlyphPattern {
  static readonly EMPTY = new GlyphPattern([]);

  /** Cells in row-major order, without duplicates. */
  readonly cells: readonly Cell[];
  readonly key: string;

  constructor(cells: Iterable<Cell>) {
    const unique = new Map<string, Cell>();
    for (const cell of cells) {
      if (!Number.isInteger(cell.x) || !Number.isInteger(cell.y) || !isCellInRange(cell.x, cell.y)) {
        throw new RangeError(`Cell (${cell.x}, ${cell.y}) is outside the ${SCALE_SIZE}x${SCALE_SIZE} grid`);
      }
      unique.set(`${cell.x},${cell.y}`, Object.freeze({ x: cell.x, y: cell.y }));
    }
    this.cells = Object.freeze([...unique.values()].sort(compareCells));
    this.key = this.cells.map((c) => `${c.x},${c.y}`).join(';');
  }

  get size(): number {
    return this.cells.length;
  }

  get isEmpty(): boolean {
    return this.cells.length === 0;
  }

  has(x: number, y: number): boolean {
    return this.cells.some((c) => c.x === x && c.y === y);
  }

  equals(other: GlyphPattern): boolean {
    return this.key === other.key;
  }

  /** Render as SCALE_SIZE rows of `#` (ink) and `.` (background). */
  toString(): string {
    const rows: string[] = [];
    for (let y = 0; y < SCALE_SIZE; y++) {
      let row = '';
      for (let x = 0; x < SCALE_SIZE; x++) {
        row += this.has(x, y) ? '#' : '.';
      }
      rows.push(row);
    }
    return rows.join('\n');
  }

  /** Inverse of toString(): any character other than `.` or space is ink. */
  static fromRows(rows: readonly string[]): GlyphPattern {
    const cells: Cell[] = [];
    rows.forEach((row, y) => {
      [...row].forEach((ch, x) => {
        if (ch !== '.' && ch !== ' ') cells.push({ x, y });
      });
    });
    return new GlyphPattern(cells);
  }
}
