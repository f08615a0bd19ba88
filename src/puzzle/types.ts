// Puzzle system types
import type { Board } from './board/Board';

// ============= Basic Types =============

// Tile label; 0 is the blank
export type Tile = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

// Row-major labels of a 3x3 board
export type BoardLabels = readonly [Tile, Tile, Tile, Tile, Tile, Tile, Tile, Tile, Tile];

// Direction the blank slides
export type Move = 'up' | 'down' | 'left' | 'right';

export type DifficultyLevel = 'easy' | 'medium' | 'hard' | 'expert';

export interface Position {
  row: number;
  col: number;
}

// Board key format: the 9 labels concatenated, e.g. "123456780"
export type BoardKey = string;

// Anything the solver accepts as a board
export type BoardInput = Board | readonly number[];

// ============= Move Types =============

export interface Neighbor {
  move: Move;
  state: Board;
}

// ============= Search Types =============

export interface SearchNode {
  state: Board;
  g: number;
  h: number;
  f: number;
  parent: SearchNode | null;
  move: Move | null;
  // Insertion sequence number, used for FIFO tie-breaking
  order: number;
}

export type Heuristic = (state: Board, goal: Board) => number;

export type TieBreak = 'fifo' | 'lowest-h';

export interface SolveOptions {
  heuristic?: Heuristic;
  tieBreak?: TieBreak;
  maxExpansions?: number;
  timeoutMs?: number;
  precheck?: boolean;  // defaults to true
  trace?: boolean;
  debug?: boolean;
}

export interface SolveTrace {
  nodesExpanded: number;
  nodesGenerated: number;
  maxFrontierSize: number;
  solveTimeMs: number;
}

// ============= Solution Types =============

export interface SolutionStep {
  move: Move;
  // Board after the move
  board: Board;
}

export interface SolveResult {
  moves: Move[];
  steps: SolutionStep[];
  // Start first, goal last
  states: Board[];
  trace?: SolveTrace;
}

// ============= Generator Types =============

export interface ScrambleOptions {
  random?: () => number;
  maxAttempts?: number;
  allowSolved?: boolean;
}

// ============= Playback Types =============

export interface Frame {
  index: number;
  move: Move;
  from: Board;
  to: Board;
  // The tile that slid into the blank's old cell
  movedTile: Tile;
  movedFrom: Position;
  movedTo: Position;
}
