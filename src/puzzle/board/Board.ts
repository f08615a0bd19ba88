// Immutable 3x3 board: the puzzle state shared by the frontier and explored set

import type { BoardKey, BoardLabels, Position, Tile } from '../types';
import { BLANK, CELL_COUNT, GOAL_LABELS, GRID_SIZE } from '../constants';
import { InvalidBoardError } from '../errors';

// ============= Validation =============

function isTile(value: number): value is Tile {
  return Number.isInteger(value) && value >= 0 && value < CELL_COUNT;
}

function isBoardLabels(values: readonly Tile[]): values is BoardLabels {
  return values.length === CELL_COUNT;
}

function missingLabels(seen: ReadonlySet<number>): number[] {
  const missing: number[] = [];
  for (let label = 0; label < CELL_COUNT; label++) {
    if (!seen.has(label)) missing.push(label);
  }
  return missing;
}

function validateLabels(values: readonly number[]): BoardLabels {
  if (values.length !== CELL_COUNT) {
    throw new InvalidBoardError(`Board must have ${CELL_COUNT} labels, got ${values.length}`);
  }

  const tiles: Tile[] = [];
  const seen = new Set<number>();

  values.forEach((value, index) => {
    if (!isTile(value)) {
      throw new InvalidBoardError(`Label ${value} at index ${index} is outside [0, ${CELL_COUNT - 1}]`);
    }
    if (seen.has(value)) {
      const missing = missingLabels(new Set(values));
      throw new InvalidBoardError(`Duplicate label ${value} at index ${index} (missing ${missing.join(', ')})`);
    }
    seen.add(value);
    tiles.push(value);
  });

  if (!isBoardLabels(tiles)) {
    throw new InvalidBoardError(`Board must have ${CELL_COUNT} labels, got ${tiles.length}`);
  }
  return tiles;
}

export function indexToPosition(index: number): Position {
  return { row: Math.floor(index / GRID_SIZE), col: index % GRID_SIZE };
}

export function positionToIndex(pos: Position): number {
  return pos.row * GRID_SIZE + pos.col;
}

export function isInsideGrid(pos: Position): boolean {
  if (!Number.isInteger(pos.row) || !Number.isInteger(pos.col)) return false;
  return pos.row >= 0 && pos.row < GRID_SIZE && pos.col >= 0 && pos.col < GRID_SIZE;
}

// ============= Board =============

export class Board {
  readonly labels: BoardLabels;
  readonly blankIndex: number;
  readonly key: BoardKey;

  private constructor(labels: BoardLabels) {
    this.labels = labels;
    this.blankIndex = labels.indexOf(BLANK);
    this.key = labels.join('');
  }

  /**
   * Build a board from 9 row-major labels.
   * Throws InvalidBoardError on wrong length, duplicates or out-of-range labels.
   */
  static from(values: readonly number[]): Board {
    return new Board(Object.freeze(validateLabels(values)));
  }

  static goal(): Board {
    return new Board(GOAL_LABELS);
  }

  get blank(): Position {
    return indexToPosition(this.blankIndex);
  }

  at(row: number, col: number): Tile {
    if (!isInsideGrid({ row, col })) {
      throw new RangeError(`Cell (${row}, ${col}) is outside the ${GRID_SIZE}x${GRID_SIZE} grid`);
    }
    return this.labels[positionToIndex({ row, col })];
  }

  indexOf(label: Tile): number {
    return this.labels.indexOf(label);
  }

  positionOf(label: Tile): Position {
    return indexToPosition(this.indexOf(label));
  }

  // New board with the labels at a and b exchanged; the receiver is unchanged
  swap(a: Position, b: Position): Board {
    if (!isInsideGrid(a) || !isInsideGrid(b)) {
      throw new RangeError(`Cannot swap (${a.row}, ${a.col}) with (${b.row}, ${b.col})`);
    }
    const i = positionToIndex(a);
    const j = positionToIndex(b);
    const next: [...BoardLabels] = [...this.labels];
    const tmp = next[i];
    next[i] = next[j];
    next[j] = tmp;
    return new Board(Object.freeze(next));
  }

  equals(other: Board): boolean {
    return this.key === other.key;
  }

  // Mutable copy of the labels
  toArray(): Tile[] {
    return [...this.labels];
  }

  toString(): string {
    return this.key;
  }

  // Three text rows, blank shown as "_"
  format(): string {
    const rows: string[] = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      const cells: string[] = [];
      for (let col = 0; col < GRID_SIZE; col++) {
        const label = this.at(row, col);
        cells.push(label === BLANK ? '_' : String(label));
      }
      rows.push(cells.join(' '));
    }
    return rows.join('\n');
  }
}
