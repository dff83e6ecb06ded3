/** Derived playback state, computed from the element's `paused`/`ended` flags */
export type AudioState = 'playing' | 'paused' | 'ended'

/** Media types recognized from a source URL's extension */
export type AudioType = 'mp3' | 'ogg' | 'wav'

/** How eagerly the media engine should fetch audio data before playback */
export type AudioPreload = 'none' | 'metadata' | 'auto'

/** A playback position to jump to: start, end, or explicit seconds */
export type Seek = 'start' | 'end' | number

export interface AudioSource {
  readonly type: AudioType
  readonly url: string
}
