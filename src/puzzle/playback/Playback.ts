// Playback - turns a solution into frames for an external renderer

import type { Frame, Move, SolveResult } from '../types';
import type { Board } from '../board/Board';
import { applyMove, oppositeMove } from '../moves/MoveGenerator';

// One frame per slide; the moved tile travels opposite to the blank
export function toFrames(result: SolveResult): Frame[] {
  return result.steps.map((step, index) => {
    const from = result.states[index];
    const to = step.board;
    const movedFrom = to.blank;
    const movedTo = from.blank;
    return {
      index,
      move: step.move,
      from,
      to,
      movedTile: from.at(movedFrom.row, movedFrom.col),
      movedFrom,
      movedTo
    };
  });
}

// e.g. "Move tile 5 up"
export function describeMove(frame: Frame): string {
  return `Move tile ${frame.movedTile} ${oppositeMove(frame.move)}`;
}

// Every board from start through the last move
export function* replay(start: Board, moves: readonly Move[]): Generator<Board> {
  let board = start;
  yield board;
  for (const move of moves) {
    board = applyMove(board, move);
    yield board;
  }
}
