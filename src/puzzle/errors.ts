// Error taxonomy for the search core

import type { SolveTrace } from './types';

export class PuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PuzzleError';
  }
}

// Malformed board input: wrong size, duplicate, missing or out-of-range labels
export class InvalidBoardError extends PuzzleError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBoardError';
  }
}

// A move that would slide the blank off the grid
export class IllegalMoveError extends PuzzleError {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalMoveError';
  }
}

// The goal cannot be reached from the start board
export class UnsolvableError extends PuzzleError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsolvableError';
  }
}

export type BudgetKind = 'expansions' | 'timeout';

// The search hit a caller-imposed step or time budget
export class SearchBudgetExceededError extends PuzzleError {
  readonly reason: BudgetKind;
  readonly limit: number;
  readonly trace: SolveTrace;

  constructor(reason: BudgetKind, limit: number, trace: SolveTrace) {
    const unit = reason === 'expansions' ? 'expansions' : 'ms';
    super(`Search budget exceeded: ${limit} ${unit} (${trace.nodesExpanded} nodes expanded)`);
    this.name = 'SearchBudgetExceededError';
    this.reason = reason;
    this.limit = limit;
    this.trace = trace;
  }
}
