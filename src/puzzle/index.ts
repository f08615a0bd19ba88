// Puzzle System - Board, Moves, Analysis, Solver, Generator, Playback

// Re-export types
export type {
  Tile,
  BoardLabels,
  BoardKey,
  BoardInput,
  Move,
  Position,
  Neighbor,
  SearchNode,
  Heuristic,
  TieBreak,
  SolveOptions,
  SolveTrace,
  SolveResult,
  SolutionStep,
  ScrambleOptions,
  Frame,
  DifficultyLevel
} from './types';

export { GRID_SIZE, BLANK, GOAL_LABELS, MOVE_ORDER } from './constants';

export {
  PuzzleError,
  InvalidBoardError,
  IllegalMoveError,
  UnsolvableError,
  SearchBudgetExceededError
} from './errors';
export type { BudgetKind } from './errors';

// Board API
export { Board, indexToPosition, positionToIndex, isInsideGrid } from './board';

// Move API
export {
  neighbors,
  applyMove,
  applyMoves,
  legalMoves,
  isLegalMove,
  oppositeMove
} from './moves';

// Analysis API
export {
  countInversions,
  inversionsRelativeTo,
  isSolvable,
  assertSolvable,
  manhattanDistance,
  misplacedTiles,
  shortestDistance,
  distancesFromGoal,
  rateDifficulty
} from './analysis';

// Solver API
export { solve, solutionLength, DEFAULT_SOLVE_OPTIONS } from './solver';

// Generator API
export { shuffleSolvable, scrambleByWalk } from './generator';
export type { ScrambleWalk } from './generator';

// Playback API
export { toFrames, describeMove, replay } from './playback';

// Utilities
export { createSeededRandom } from './utils/random';
export type { RandomFn } from './utils/random';
