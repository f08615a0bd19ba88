// Move generation: slides of the blank tile

import type { Move, Neighbor, Position } from '../types';
import { MOVE_OFFSETS, MOVE_ORDER, OPPOSITE_MOVE } from '../constants';
import { Board, isInsideGrid } from '../board/Board';
import { IllegalMoveError } from '../errors';

// Cell the blank would slide into, or null when it leaves the grid
function targetOf(state: Board, move: Move): Position | null {
  const blank = state.blank;
  const offset = MOVE_OFFSETS[move];
  const target = { row: blank.row + offset.row, col: blank.col + offset.col };
  return isInsideGrid(target) ? target : null;
}

export function oppositeMove(move: Move): Move {
  return OPPOSITE_MOVE[move];
}

export function isLegalMove(state: Board, move: Move): boolean {
  return targetOf(state, move) !== null;
}

export function legalMoves(state: Board): Move[] {
  return MOVE_ORDER.filter(move => isLegalMove(state, move));
}

/**
 * Slide the blank one cell in the given direction.
 * The tile at the target cell takes the blank's old place.
 */
export function applyMove(state: Board, move: Move): Board {
  const target = targetOf(state, move);
  if (!target) {
    const { row, col } = state.blank;
    throw new IllegalMoveError(`Cannot move ${move}: blank at (${row}, ${col}) is on the edge`);
  }
  return state.swap(state.blank, target);
}

export function applyMoves(state: Board, moves: readonly Move[]): Board {
  return moves.reduce((board, move) => applyMove(board, move), state);
}

// Neighbor states in fixed up/down/left/right order
export function neighbors(state: Board): Neighbor[] {
  const result: Neighbor[] = [];
  for (const move of MOVE_ORDER) {
    const target = targetOf(state, move);
    if (target) {
      result.push({ move, state: state.swap(state.blank, target) });
    }
  }
  return result;
}
