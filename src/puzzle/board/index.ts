// Board exports
export { Board, indexToPosition, positionToIndex, isInsideGrid } from './Board';
