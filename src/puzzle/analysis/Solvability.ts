// Solvability check via inversion parity
//
// A slide never changes the parity of the inversion count on a grid of odd
// width, so a board reaches the goal iff its inversions, counted in the
// goal's label order, are even.

import { Board } from '../board/Board';
import { BLANK } from '../constants';
import { UnsolvableError } from '../errors';

// Pairs i < j (blank excluded) with values[i] > values[j]
export function countInversions(values: readonly number[]): number {
  const tiles = values.filter(v => v !== BLANK);
  let inversions = 0;
  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }
  return inversions;
}

// Inversions of board with each label replaced by its rank in goal
export function inversionsRelativeTo(board: Board, goal: Board): number {
  const ranks = board.labels
    .filter(label => label !== BLANK)
    .map(label => goal.indexOf(label));
  return countInversions(ranks.map(rank => rank + 1));
}

export function isSolvable(board: Board, goal: Board = Board.goal()): boolean {
  return inversionsRelativeTo(board, goal) % 2 === 0;
}

export function assertSolvable(board: Board, goal: Board = Board.goal()): void {
  if (!isSolvable(board, goal)) {
    const inversions = inversionsRelativeTo(board, goal);
    throw new UnsolvableError(`Board ${board.key} cannot reach ${goal.key} (${inversions} inversions, odd parity)`);
  }
}
