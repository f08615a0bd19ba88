// Heuristics for A*: both are admissible and consistent for unit-cost slides

import type { Heuristic, Position } from '../types';
import type { Board } from '../board/Board';
import { BLANK } from '../constants';
import { indexToPosition } from '../board/Board';

function goalPositions(goal: Board): Position[] {
  const positions: Position[] = [];
  goal.labels.forEach((label, index) => {
    positions[label] = indexToPosition(index);
  });
  return positions;
}

/**
 * Sum over the 8 non-blank tiles of |row - goalRow| + |col - goalCol|.
 * One slide moves exactly one tile by one cell, so the estimate changes by
 * exactly 1 per move.
 */
export const manhattanDistance: Heuristic = (state, goal) => {
  const targets = goalPositions(goal);
  let total = 0;
  state.labels.forEach((label, index) => {
    if (label === BLANK) return;
    const current = indexToPosition(index);
    const target = targets[label];
    total += Math.abs(current.row - target.row) + Math.abs(current.col - target.col);
  });
  return total;
};

// Count of non-blank tiles away from their goal cell
export const misplacedTiles: Heuristic = (state, goal) => {
  let count = 0;
  state.labels.forEach((label, index) => {
    if (label !== BLANK && goal.labels[index] !== label) count++;
  });
  return count;
};
