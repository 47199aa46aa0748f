export * from './types';
export { Mixer, TRACK_FINISHED } from './Mixer';
export { FramePump, type AudioSink } from './FramePump';
