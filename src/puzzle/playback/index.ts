// Playback exports
export { toFrames, describeMove, replay } from './Playback';
