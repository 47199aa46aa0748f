export { PlaybackQueue, type EnqueueResult } from './PlaybackQueue';
