import { describe, it, expect, beforeAll, vi } from 'vitest';
import { solve, solutionLength, frontierComparator, DEFAULT_SOLVE_OPTIONS } from './AStarSolver';
import { Board } from '../board/Board';
import { applyMove, applyMoves } from '../moves/MoveGenerator';
import { manhattanDistance, misplacedTiles } from '../analysis/Heuristic';
import { distancesFromGoal, shortestDistance } from '../analysis/Distances';
import { isSolvable } from '../analysis/Solvability';
import { scrambleByWalk } from '../generator/Scrambler';
import { InvalidBoardError, SearchBudgetExceededError, UnsolvableError } from '../errors';
import { createSeededRandom, shuffle } from '../utils/random';
import { GOAL_LABELS } from '../constants';
import type { BoardKey, Heuristic, SearchNode, SolveResult } from '../types';

// ============================================================================
// Test Helpers
// ============================================================================

const SCENARIO = [1, 2, 3, 4, 0, 6, 7, 5, 8];
const HARDEST = [8, 6, 7, 2, 5, 4, 3, 0, 1];

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function solvableBoards(seed: number, count: number): Board[] {
  const random = createSeededRandom(seed);
  const boards: Board[] = [];
  while (boards.length < count) {
    const board = Board.from(shuffle(random, GOAL_LABELS));
    if (isSolvable(board)) boards.push(board);
  }
  return boards;
}

function walkBoards(seed: number, count: number, steps: number): Board[] {
  const random = createSeededRandom(seed);
  return Array.from({ length: count }, () => scrambleByWalk(steps, Board.goal(), { random }).board);
}

function node(f: number, h: number, order: number): SearchNode {
  return { state: Board.goal(), g: f - h, h, f, parent: null, move: null, order };
}

// ============================================================================
// Concrete scenarios
// ============================================================================

describe('solve', () => {
  it('solves the centered-blank scenario in two slides', () => {
    const result = solve(SCENARIO);
    expect(result.moves).toEqual(['down', 'right']);
    expect(result.states.map(s => s.key)).toEqual(['123406758', '123456708', '123456780']);
    expect(result.steps.map(s => s.board.key)).toEqual(['123456708', '123456780']);
    expect(result.trace).toBeUndefined();
  });

  it('reports search statistics when asked', () => {
    const result = solve(SCENARIO, Board.goal(), { trace: true });
    expect(result.trace).toMatchObject({
      nodesExpanded: 2,
      nodesGenerated: 7,
      maxFrontierSize: 5,
    });
  });

  it('returns an empty path when start equals goal', () => {
    const result = solve(Board.goal(), Board.goal(), { trace: true });
    expect(result.moves).toEqual([]);
    expect(result.steps).toEqual([]);
    expect(result.states.map(s => s.key)).toEqual(['123456780']);
    expect(result.trace?.nodesExpanded).toBe(0);
  });

  it('accepts raw label arrays for start and goal', () => {
    const result = solve([1, 2, 3, 4, 5, 6, 7, 0, 8], [1, 2, 3, 4, 5, 6, 7, 8, 0]);
    expect(result.moves).toEqual(['right']);
  });

  it('solves toward a custom goal', () => {
    const goal = applyMoves(Board.goal(), ['up', 'up', 'left', 'left']);
    const result = solve(Board.goal(), goal);
    expect(result.moves).toHaveLength(4);
    expect(applyMoves(Board.goal(), result.moves).equals(goal)).toBe(true);
  });

  it('reports the optimal length through solutionLength', () => {
    expect(solutionLength(SCENARIO)).toBe(2);
    expect(solutionLength(Board.goal())).toBe(0);
  });
});

// ============================================================================
// Input validation and failure modes
// ============================================================================

describe('solve failures', () => {
  it('rejects a malformed start before searching', () => {
    const heuristic = vi.fn(manhattanDistance);
    expect(() => solve([1, 2, 3, 4, 5, 6, 3, 8, 0], Board.goal(), { heuristic })).toThrow(InvalidBoardError);
    expect(heuristic).not.toHaveBeenCalled();
  });

  it('rejects a malformed goal before searching', () => {
    const heuristic = vi.fn(manhattanDistance);
    expect(() => solve(SCENARIO, [1, 2, 3], { heuristic })).toThrow('Board must have 9 labels, got 3');
    expect(heuristic).not.toHaveBeenCalled();
  });

  it('rejects an unsolvable start by parity', () => {
    const heuristic = vi.fn(manhattanDistance);
    expect(() => solve([2, 1, 3, 4, 5, 6, 7, 8, 0], Board.goal(), { heuristic })).toThrow(
      'Board 213456780 cannot reach 123456780 (1 inversions, odd parity)'
    );
    expect(heuristic).not.toHaveBeenCalled();
  });

  it('exhausts the frontier when the parity precheck is off', () => {
    const err = catchError(() => solve([2, 1, 3, 4, 5, 6, 7, 8, 0], Board.goal(), { precheck: false }));
    expect(err).toBeInstanceOf(UnsolvableError);
    expect(err).toHaveProperty(
      'message',
      'Frontier exhausted after 181440 expansions: 213456780 cannot reach 123456780'
    );
  }, 60000);
});

// ============================================================================
// Budgets
// ============================================================================

describe('search budgets', () => {
  it('stops after maxExpansions with the trace so far', () => {
    const err = catchError(() => solve(HARDEST, Board.goal(), { maxExpansions: 5 }));
    expect(err).toBeInstanceOf(SearchBudgetExceededError);
    expect(err).toHaveProperty('reason', 'expansions');
    expect(err).toHaveProperty('limit', 5);
    expect(err).toHaveProperty('trace.nodesExpanded', 5);
    expect(err).toHaveProperty('message', 'Search budget exceeded: 5 expansions (5 nodes expanded)');
  });

  it('stops once the deadline passes', () => {
    let now = 0;
    const clock = vi.spyOn(Date, 'now').mockImplementation(() => (now += 10));
    try {
      const err = catchError(() => solve(HARDEST, Board.goal(), { timeoutMs: 25 }));
      expect(err).toBeInstanceOf(SearchBudgetExceededError);
      expect(err).toHaveProperty('reason', 'timeout');
      expect(err).toHaveProperty('limit', 25);
      expect(err).toHaveProperty('trace.nodesExpanded', 2);
      expect(err).toHaveProperty('message', 'Search budget exceeded: 25 ms (2 nodes expanded)');
    } finally {
      clock.mockRestore();
    }
  });

  it('still returns a start that is already solved with a zero budget', () => {
    expect(solve(Board.goal(), Board.goal(), { maxExpansions: 0 }).moves).toEqual([]);
  });

  it('leaves nothing behind after a budget failure', () => {
    const board = Board.from([1, 2, 3, 4, 8, 5, 7, 6, 0]);
    const fresh = solve(board);
    expect(() => solve(board, Board.goal(), { maxExpansions: 1 })).toThrow(SearchBudgetExceededError);
    const retried = solve(board, Board.goal(), { maxExpansions: 1_000_000 });
    expect(retried.moves).toEqual(fresh.moves);
  });
});

// ============================================================================
// Properties
// ============================================================================

describe('solve properties', () => {
  let distances: Map<BoardKey, number>;

  beforeAll(() => {
    distances = distancesFromGoal();
  });

  it('finds shortest paths on random solvable boards', () => {
    for (const board of solvableBoards(17, 12)) {
      const result = solve(board);
      expect(result.moves.length).toBe(distances.get(board.key));
    }
  }, 60000);

  it('finds shortest paths with either tie-break policy', () => {
    for (const board of walkBoards(4, 15, 30)) {
      const expected = distances.get(board.key);
      expect(solve(board, Board.goal(), { tieBreak: 'fifo' }).moves.length).toBe(expected);
      expect(solve(board, Board.goal(), { tieBreak: 'lowest-h' }).moves.length).toBe(expected);
    }
  }, 60000);

  it('finds shortest paths with the misplaced-tiles heuristic', () => {
    for (const board of walkBoards(8, 5, 14)) {
      const result = solve(board, Board.goal(), { heuristic: misplacedTiles });
      expect(result.moves.length).toBe(distances.get(board.key));
    }
  }, 60000);

  it('replays each move sequence onto the goal', () => {
    for (const board of walkBoards(12, 10, 25)) {
      const result = solve(board);
      expect(applyMoves(board, result.moves).equals(Board.goal())).toBe(true);
      result.moves.forEach((move, i) => {
        expect(applyMove(result.states[i], move).equals(result.states[i + 1])).toBe(true);
      });
    }
  }, 60000);

  it('returns identical move sequences on repeated calls', () => {
    for (const board of walkBoards(30, 8, 24)) {
      for (const tieBreak of ['fifo', 'lowest-h'] as const) {
        const first = solve(board, Board.goal(), { tieBreak });
        const second = solve(board, Board.goal(), { tieBreak });
        expect(JSON.stringify(second.moves)).toBe(JSON.stringify(first.moves));
      }
    }
  }, 60000);

  it('agrees with breadth-first search toward a custom goal', () => {
    const random = createSeededRandom(77);
    const goal = scrambleByWalk(9, Board.goal(), { random }).board;
    for (const board of walkBoards(31, 5, 12)) {
      expect(solve(board, goal).moves.length).toBe(shortestDistance(board, goal));
    }
  }, 60000);
});

// ============================================================================
// Re-entrancy and ordering
// ============================================================================

describe('solve isolation', () => {
  it('allows a nested solve from inside a heuristic', () => {
    let nested: SolveResult | undefined;
    const reentrant: Heuristic = (state, goal) => {
      if (!nested) nested = solve([1, 2, 3, 4, 5, 6, 7, 0, 8]);
      return manhattanDistance(state, goal);
    };
    const outer = solve(SCENARIO, Board.goal(), { heuristic: reentrant });
    expect(outer.moves).toEqual(['down', 'right']);
    expect(nested?.moves).toEqual(['right']);
  });

  it('logs start and outcome in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      solve(SCENARIO, Board.goal(), { debug: true });
      expect(log).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenNthCalledWith(1, 'solve:', '123406758', '->', '123456780', { tieBreak: 'fifo' });
      expect(log.mock.calls[1][0]).toBe('  Solved in 2 moves');
    } finally {
      log.mockRestore();
    }
  });

  it('falls back to defaults for options passed as undefined', () => {
    const result = solve(SCENARIO, Board.goal(), {
      heuristic: undefined,
      tieBreak: undefined,
      trace: undefined,
      debug: undefined
    });
    expect(result.moves).toEqual(['down', 'right']);
    expect(result.trace).toBeUndefined();
  });

  it('keeps the parity precheck when precheck is undefined', () => {
    expect(() => solve([2, 1, 3, 4, 5, 6, 7, 8, 0], Board.goal(), { precheck: undefined })).toThrow(
      'Board 213456780 cannot reach 123456780 (1 inversions, odd parity)'
    );
  });

  it('defaults to FIFO tie-breaking with Manhattan distance', () => {
    expect(DEFAULT_SOLVE_OPTIONS.tieBreak).toBe('fifo');
    expect(DEFAULT_SOLVE_OPTIONS.heuristic).toBe(manhattanDistance);
    expect(DEFAULT_SOLVE_OPTIONS.precheck).toBe(true);
  });
});

describe('frontierComparator', () => {
  const earlierHigherH = node(5, 3, 0);
  const laterLowerH = node(5, 1, 1);

  it('orders by f first', () => {
    expect(frontierComparator('fifo')(node(4, 4, 9), node(5, 0, 0))).toBeLessThan(0);
    expect(frontierComparator('lowest-h')(node(4, 4, 9), node(5, 0, 0))).toBeLessThan(0);
  });

  it('pops equal f in insertion order under fifo', () => {
    expect(frontierComparator('fifo')(earlierHigherH, laterLowerH)).toBeLessThan(0);
  });

  it('pops equal f by smaller h under lowest-h', () => {
    expect(frontierComparator('lowest-h')(earlierHigherH, laterLowerH)).toBeGreaterThan(0);
    expect(frontierComparator('lowest-h')(node(5, 2, 0), node(5, 2, 1))).toBeLessThan(0);
  });
});
