// Solver exports
export { solve, solutionLength, frontierComparator, DEFAULT_SOLVE_OPTIONS } from './AStarSolver';
