// Types
export type { AudioPreload, AudioSource, AudioState, AudioType, Seek } from './types'

// Sources
export {
  audioSource,
  getMimeType,
  InvalidAudioSourceError,
  makeAudioSource,
} from './audio-source'

// Settings
export {
  AudioSettingsSchema,
  DEFAULT_AUDIO_SETTINGS,
  resolveAudioSettings,
  type AudioSettings,
  type AudioSettingsInput,
} from './audio-settings'

// Attribute Codec
export {
  decodeFlag,
  encodeFlag,
  encodePreload,
  getFlagAttribute,
  setFlagAttribute,
} from './attribute-codec'

// Audio Handle
export {
  asAudioHandle,
  isAudioElement,
  makeAudioHandle,
  type AudioHandle,
  type MakeAudioHandleOptions,
} from './make-audio-handle'
