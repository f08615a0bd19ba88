// Move exports
export {
  neighbors,
  applyMove,
  applyMoves,
  legalMoves,
  isLegalMove,
  oppositeMove
} from './MoveGenerator';
