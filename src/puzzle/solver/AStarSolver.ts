// A* search over board states, guided by an admissible, consistent heuristic

import type {
  BoardInput,
  BoardKey,
  Heuristic,
  SearchNode,
  SolutionStep,
  SolveOptions,
  SolveResult,
  SolveTrace,
  TieBreak
} from '../types';
import { Board } from '../board/Board';
import { neighbors } from '../moves/MoveGenerator';
import { manhattanDistance } from '../analysis/Heuristic';
import { assertSolvable } from '../analysis/Solvability';
import { SearchBudgetExceededError, UnsolvableError } from '../errors';
import { PriorityQueue } from '../utils/PriorityQueue';
import type { Comparator } from '../utils/PriorityQueue';

type ResolvedOptions = {
  heuristic: Heuristic;
  tieBreak: TieBreak;
  precheck: boolean;
  trace: boolean;
  debug: boolean;
  maxExpansions?: number;
  timeoutMs?: number;
};

export const DEFAULT_SOLVE_OPTIONS: ResolvedOptions = {
  heuristic: manhattanDistance,
  tieBreak: 'fifo',
  precheck: true,
  trace: false,
  debug: false
};

// Per-call state; nothing survives between solve() calls
interface SearchContext {
  options: ResolvedOptions;
  goal: Board;
  frontier: PriorityQueue<SearchNode>;
  // Best g of every expanded state
  explored: Map<BoardKey, number>;
  // Best g of every state pushed to the frontier
  queued: Map<BoardKey, number>;
  trace: SolveTrace;
  startTime: number;
  nextOrder: number;
}

// ============= Frontier Ordering =============

const byInsertion: Comparator<SearchNode> = (a, b) => a.f - b.f || a.order - b.order;

const byLowestH: Comparator<SearchNode> = (a, b) => a.f - b.f || a.h - b.h || a.order - b.order;

export function frontierComparator(tieBreak: TieBreak): Comparator<SearchNode> {
  return tieBreak === 'lowest-h' ? byLowestH : byInsertion;
}

// ============= Helpers =============

function toBoard(input: BoardInput): Board {
  return input instanceof Board ? input : Board.from(input);
}

function createNode(
  ctx: SearchContext,
  state: Board,
  g: number,
  parent: SearchNode | null,
  move: SearchNode['move']
): SearchNode {
  const h = ctx.options.heuristic(state, ctx.goal);
  return { state, g, h, f: g + h, parent, move, order: ctx.nextOrder++ };
}

function enqueue(ctx: SearchContext, node: SearchNode): void {
  ctx.queued.set(node.state.key, node.g);
  ctx.frontier.push(node);
  ctx.trace.nodesGenerated++;
  ctx.trace.maxFrontierSize = Math.max(ctx.trace.maxFrontierSize, ctx.frontier.size);
}

function elapsed(ctx: SearchContext): number {
  return Date.now() - ctx.startTime;
}

function snapshotTrace(ctx: SearchContext): SolveTrace {
  return { ...ctx.trace, solveTimeMs: elapsed(ctx) };
}

// Throws when the caller's step or time budget is used up
function checkBudget(ctx: SearchContext): void {
  const { maxExpansions, timeoutMs } = ctx.options;
  if (maxExpansions !== undefined && ctx.trace.nodesExpanded >= maxExpansions) {
    throw new SearchBudgetExceededError('expansions', maxExpansions, snapshotTrace(ctx));
  }
  if (timeoutMs !== undefined && elapsed(ctx) > timeoutMs) {
    throw new SearchBudgetExceededError('timeout', timeoutMs, snapshotTrace(ctx));
  }
}

// Walk parent links back to the start
function reconstructSteps(node: SearchNode): SolutionStep[] {
  const steps: SolutionStep[] = [];
  let current: SearchNode | null = node;
  while (current && current.parent && current.move) {
    steps.push({ move: current.move, board: current.state });
    current = current.parent;
  }
  return steps.reverse();
}

function expand(ctx: SearchContext, node: SearchNode): void {
  ctx.explored.set(node.state.key, node.g);
  ctx.trace.nodesExpanded++;

  for (const { move, state } of neighbors(node.state)) {
    const g = node.g + 1;

    const exploredG = ctx.explored.get(state.key);
    if (exploredG !== undefined && exploredG <= g) continue;

    const queuedG = ctx.queued.get(state.key);
    if (queuedG !== undefined && queuedG <= g) continue;

    enqueue(ctx, createNode(ctx, state, g, node, move));
  }
}

// Popped node superseded by a cheaper expansion of the same state
function isStale(ctx: SearchContext, node: SearchNode): boolean {
  const exploredG = ctx.explored.get(node.state.key);
  return exploredG !== undefined && exploredG <= node.g;
}

// Fields left out or passed as undefined fall back to the defaults
function resolveOptions(options: SolveOptions): ResolvedOptions {
  return {
    heuristic: options.heuristic ?? DEFAULT_SOLVE_OPTIONS.heuristic,
    tieBreak: options.tieBreak ?? DEFAULT_SOLVE_OPTIONS.tieBreak,
    precheck: options.precheck ?? DEFAULT_SOLVE_OPTIONS.precheck,
    trace: options.trace ?? DEFAULT_SOLVE_OPTIONS.trace,
    debug: options.debug ?? DEFAULT_SOLVE_OPTIONS.debug,
    maxExpansions: options.maxExpansions,
    timeoutMs: options.timeoutMs
  };
}

// ============= Solver =============

/**
 * Find a shortest sequence of blank slides from start to goal.
 *
 * Equal f values pop in insertion order ('fifo') or by smaller h
 * ('lowest-h'); neighbors are generated up, down, left, right, so the
 * returned path is the same on every run for the same inputs.
 */
export function solve(
  start: BoardInput,
  goal: BoardInput = Board.goal(),
  options: SolveOptions = {}
): SolveResult {
  const startBoard = toBoard(start);
  const goalBoard = toBoard(goal);
  const resolved = resolveOptions(options);

  if (resolved.debug) {
    console.log('solve:', startBoard.key, '->', goalBoard.key, { tieBreak: resolved.tieBreak });
  }

  if (resolved.precheck) {
    assertSolvable(startBoard, goalBoard);
  }

  const ctx: SearchContext = {
    options: resolved,
    goal: goalBoard,
    frontier: new PriorityQueue(frontierComparator(resolved.tieBreak)),
    explored: new Map(),
    queued: new Map(),
    trace: {
      nodesExpanded: 0,
      nodesGenerated: 0,
      maxFrontierSize: 0,
      solveTimeMs: 0
    },
    startTime: Date.now(),
    nextOrder: 0
  };

  enqueue(ctx, createNode(ctx, startBoard, 0, null, null));

  for (let node = ctx.frontier.pop(); node; node = ctx.frontier.pop()) {
    if (isStale(ctx, node)) continue;

    if (node.state.equals(goalBoard)) {
      const steps = reconstructSteps(node);
      const trace = snapshotTrace(ctx);
      if (resolved.debug) {
        console.log(`  Solved in ${steps.length} moves`, trace);
      }
      return {
        moves: steps.map(step => step.move),
        steps,
        states: [startBoard, ...steps.map(step => step.board)],
        trace: resolved.trace ? trace : undefined
      };
    }

    checkBudget(ctx);
    expand(ctx, node);
  }

  const trace = snapshotTrace(ctx);
  if (resolved.debug) {
    console.log('  Frontier exhausted', trace);
  }
  throw new UnsolvableError(
    `Frontier exhausted after ${trace.nodesExpanded} expansions: ${startBoard.key} cannot reach ${goalBoard.key}`
  );
}

// Number of moves in an optimal solution
export function solutionLength(start: BoardInput, goal: BoardInput = Board.goal()): number {
  return solve(start, goal).moves.length;
}
