// Generator exports
export { shuffleSolvable, scrambleByWalk } from './Scrambler';
export type { ScrambleWalk } from './Scrambler';
