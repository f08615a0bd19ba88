// Scrambler - produces solvable start boards from a goal arrangement

import type { Move, ScrambleOptions } from '../types';
import { Board } from '../board/Board';
import { applyMove, legalMoves, oppositeMove } from '../moves/MoveGenerator';
import { isSolvable } from '../analysis/Solvability';
import { DEFAULT_SCRAMBLE_ATTEMPTS } from '../constants';
import { PuzzleError } from '../errors';
import { randomChoice, shuffle } from '../utils/random';

export interface ScrambleWalk {
  board: Board;
  // Moves applied to the goal, in order
  moves: Move[];
}

// Shuffle the goal's labels until the result can reach the goal
export function shuffleSolvable(goal: Board = Board.goal(), options: ScrambleOptions = {}): Board {
  const random = options.random ?? Math.random;
  const maxAttempts = options.maxAttempts ?? DEFAULT_SCRAMBLE_ATTEMPTS;
  const stats = { unsolvable: 0, alreadySolved: 0 };

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const board = Board.from(shuffle(random, goal.labels));

    if (!isSolvable(board, goal)) {
      stats.unsolvable++;
      continue;
    }
    if (!options.allowSolved && board.equals(goal)) {
      stats.alreadySolved++;
      continue;
    }

    console.log(`shuffleSolvable succeeded after ${attempt + 1} attempts`, stats);
    return board;
  }

  console.log(`shuffleSolvable failed after ${maxAttempts} attempts:`, stats);
  throw new PuzzleError(`No solvable shuffle found in ${maxAttempts} attempts`);
}

/**
 * Random walk of legal slides away from the goal, never undoing the previous
 * slide. The result is always solvable.
 */
export function scrambleByWalk(
  steps: number,
  goal: Board = Board.goal(),
  options: Pick<ScrambleOptions, 'random'> = {}
): ScrambleWalk {
  const random = options.random ?? Math.random;
  const moves: Move[] = [];
  let board = goal;

  for (let i = 0; i < steps; i++) {
    const previous = moves[moves.length - 1];
    const candidates = legalMoves(board).filter(move => previous === undefined || move !== oppositeMove(previous));
    const move = randomChoice(random, candidates);
    board = applyMove(board, move);
    moves.push(move);
  }

  return { board, moves };
}
