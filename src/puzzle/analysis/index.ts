// Analysis exports
export { countInversions, inversionsRelativeTo, isSolvable, assertSolvable } from './Solvability';
export { manhattanDistance, misplacedTiles } from './Heuristic';
export { shortestDistance, distancesFromGoal, rateDifficulty } from './Distances';
