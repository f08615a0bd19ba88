import type { BoardLabels, Move, Position } from './types';

export const GRID_SIZE = 3;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const BLANK = 0;

export const GOAL_LABELS: BoardLabels = Object.freeze([1, 2, 3, 4, 5, 6, 7, 8, 0] as const);

// Neighbor generation order; search tie-breaking depends on it
export const MOVE_ORDER: readonly Move[] = ['up', 'down', 'left', 'right'];

export const MOVE_OFFSETS: Readonly<Record<Move, Position>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

export const OPPOSITE_MOVE: Readonly<Record<Move, Move>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export const DEFAULT_SCRAMBLE_ATTEMPTS = 50;

// Upper bounds (inclusive) on optimal solution length per difficulty
export const DIFFICULTY_THRESHOLDS = {
  easy: 8,
  medium: 16,
  hard: 24,
} as const;
