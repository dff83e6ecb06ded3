import type { AudioSource, AudioType } from './types'

const MIME_TYPES: Record<AudioType, string> = {
  mp3: 'audio/mpeg',
  ogg: 'audio/ogg',
  wav: 'audio/wav',
}

function isAudioType(value: string): value is AudioType {
  return Object.hasOwn(MIME_TYPES, value)
}

export class InvalidAudioSourceError extends Error {
  constructor(readonly url: string) {
    super(`Not a valid audio source: ${url}`)
    this.name = 'InvalidAudioSourceError'
  }
}

/** MIME string written to a `<source>` element's `type` attribute */
export function getMimeType(type: AudioType): string {
  return MIME_TYPES[type]
}

/**
 * Create an audio source with its media type detected from the URL's
 * file extension. Returns undefined for unrecognized extensions.
 */
export function makeAudioSource(url: string): AudioSource | undefined {
  const extension = url.slice(-3)
  if (!isAudioType(extension)) return undefined
  return Object.freeze({ type: extension, url })
}

/**
 * Like `makeAudioSource`, but throws for unrecognized extensions.
 * Meant for URLs known at authoring time.
 */
export function audioSource(url: string): AudioSource {
  const source = makeAudioSource(url)
  if (!source) {
    throw new InvalidAudioSourceError(url)
  }
  return source
}
