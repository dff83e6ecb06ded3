/**
 * @tapedeck/solid
 *
 * SolidJS primitives over tapedeck audio handles.
 */

export {
  createAudioState,
  type AudioStateOptions,
  type AudioStateSignals,
} from './create-audio-state'
