// Exact distances by breadth-first search over the state graph

import type { BoardKey, DifficultyLevel } from '../types';
import { Board } from '../board/Board';
import { neighbors } from '../moves/MoveGenerator';
import { DIFFICULTY_THRESHOLDS } from '../constants';

/**
 * Minimum number of slides from start to goal, or null when the goal is not
 * reachable within maxDepth (or at all).
 */
export function shortestDistance(
  start: Board,
  goal: Board = Board.goal(),
  maxDepth: number = Infinity
): number | null {
  if (start.equals(goal)) return 0;

  const distances = new Map<BoardKey, number>([[start.key, 0]]);
  const queue: Board[] = [start];
  let queueIdx = 0;

  while (queueIdx < queue.length) {
    const current = queue[queueIdx++];
    const currentDist = distances.get(current.key) ?? 0;
    if (currentDist >= maxDepth) continue;

    for (const { state } of neighbors(current)) {
      if (distances.has(state.key)) continue;
      if (state.equals(goal)) return currentDist + 1;
      distances.set(state.key, currentDist + 1);
      queue.push(state);
    }
  }

  return null;
}

/**
 * Distance to the goal for every board that can reach it.
 * Covers the whole solvable half of the state space (181440 boards).
 */
export function distancesFromGoal(goal: Board = Board.goal()): Map<BoardKey, number> {
  const distances = new Map<BoardKey, number>([[goal.key, 0]]);
  const queue: Board[] = [goal];
  let queueIdx = 0;

  while (queueIdx < queue.length) {
    const current = queue[queueIdx++];
    const currentDist = distances.get(current.key) ?? 0;

    for (const { state } of neighbors(current)) {
      if (!distances.has(state.key)) {
        distances.set(state.key, currentDist + 1);
        queue.push(state);
      }
    }
  }

  return distances;
}

export function rateDifficulty(distance: number): DifficultyLevel {
  if (distance <= DIFFICULTY_THRESHOLDS.easy) return 'easy';
  if (distance <= DIFFICULTY_THRESHOLDS.medium) return 'medium';
  if (distance <= DIFFICULTY_THRESHOLDS.hard) return 'hard';
  return 'expert';
}
