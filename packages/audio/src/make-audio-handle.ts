import { clamp, debug, isFiniteNumber } from '@tapedeck/utils'
import { encodePreload, getFlagAttribute, setFlagAttribute } from './attribute-codec'
import { resolveAudioSettings, type AudioSettingsInput } from './audio-settings'
import { getMimeType } from './audio-source'
import type { AudioSource, AudioState, Seek } from './types'

const log = debug('audio:make-audio-handle', false)

export interface AudioHandle {
  /** The wrapped element. Owned by the host DOM, never removed by the handle. */
  readonly element: HTMLAudioElement
  /** Overwrite the element's `src` */
  setSource: (source: AudioSource) => void
  /** Current state, re-read from the element's `paused`/`ended` flags */
  getState: () => AudioState
  /**
   * Start playback, rewinding first when ended.
   * Resolves to false when the host refused to start (e.g. autoplay policy).
   */
  play: () => Promise<boolean>
  pause: () => void
  /** Pause and seek back to the start */
  stop: () => void
  /** Pause when playing, play otherwise */
  togglePlaying: () => void
  setMute: (muted: boolean) => void
  isMute: () => boolean
  toggleMute: () => void
  setLooping: (looping: boolean) => void
  isLooping: () => boolean
  toggleLooping: () => void
  /** Volume between 0 and 1 */
  getVolume: () => number
  /** Set the volume, clamped to [0, 1] */
  setVolume: (volume: number) => void
  /** Add `delta` to the volume, clamping the result to [0, 1] */
  modVolume: (delta: number) => void
  seek: (target: Seek) => void
  /** Duration in seconds, 0 while unknown or for unbounded streams */
  getDuration: () => number
  /** Playback position in seconds */
  getCurrentTime: () => number
}

export interface MakeAudioHandleOptions {
  /** Document used to create elements (defaults to the global document) */
  document?: Document
}

/**********************************************************************************/
/*                                                                                */
/*                                     Utils                                      */
/*                                                                                */
/**********************************************************************************/

/** Tag check backing the downcast from a generic element */
export function isAudioElement(element: Element): element is HTMLAudioElement {
  return element.tagName.toLowerCase() === 'audio'
}

function readSeconds(value: number): number {
  return isFiniteNumber(value) ? value : 0
}

function wrapAudioElement(element: HTMLAudioElement): AudioHandle {
  const handle: AudioHandle = {
    element,

    setSource(source) {
      element.src = source.url
    },

    getState() {
      if (element.paused) return 'paused'
      if (element.ended) return 'ended'
      return 'playing'
    },

    play() {
      if (handle.getState() === 'ended') {
        handle.seek('start')
      }
      return element.play().then(
        () => true,
        (error: unknown) => {
          log.warn('playback did not start', error)
          return false
        },
      )
    },

    pause() {
      element.pause()
    },

    stop() {
      handle.pause()
      handle.seek('start')
    },

    togglePlaying() {
      switch (handle.getState()) {
        case 'playing':
          handle.pause()
          break
        case 'ended':
          handle.seek('start')
          void handle.play()
          break
        case 'paused':
          void handle.play()
          break
      }
    },

    setMute(muted) {
      // The attribute only reflects `defaultMuted`, so the live flag is written as well
      element.muted = muted
      setFlagAttribute(element, 'muted', muted)
    },

    isMute() {
      return element.muted
    },

    toggleMute() {
      handle.setMute(!handle.isMute())
    },

    setLooping(looping) {
      setFlagAttribute(element, 'loop', looping)
    },

    isLooping() {
      return getFlagAttribute(element, 'loop')
    },

    toggleLooping() {
      handle.setLooping(!handle.isLooping())
    },

    getVolume() {
      return isFiniteNumber(element.volume) ? element.volume : 0
    },

    setVolume(volume) {
      if (Number.isNaN(volume)) {
        log('ignoring NaN volume')
        return
      }
      element.volume = clamp(volume, 0, 1)
    },

    modVolume(delta) {
      handle.setVolume(handle.getVolume() + delta)
    },

    seek(target) {
      const time = target === 'start' ? 0 : target === 'end' ? handle.getDuration() : target
      if (!isFiniteNumber(time)) {
        log('ignoring non-finite seek target', { target })
        return
      }
      element.currentTime = time
    },

    getDuration() {
      return readSeconds(element.duration)
    },

    getCurrentTime() {
      return readSeconds(element.currentTime)
    },
  }

  return handle
}

/**********************************************************************************/
/*                                                                                */
/*                               Make Audio Handle                                */
/*                                                                                */
/**********************************************************************************/

/**
 * Create an `<audio>` element with one `<source>` child per source and wrap it.
 * Missing settings fall back to `DEFAULT_AUDIO_SETTINGS`.
 *
 * @example
 * ```ts
 * const handle = makeAudioHandle({ controls: true, volume: 0.8 }, [
 *   audioSource('/sounds/theme.ogg'),
 *   audioSource('/sounds/theme.mp3'),
 * ])
 * document.body.append(handle.element)
 * void handle.play()
 * ```
 */
export function makeAudioHandle(
  settings: AudioSettingsInput = {},
  sources: readonly AudioSource[] = [],
  options: MakeAudioHandleOptions = {},
): AudioHandle {
  const doc = options.document ?? document
  const config = resolveAudioSettings(settings)
  const element = doc.createElement('audio')

  setFlagAttribute(element, 'controls', config.controls)
  setFlagAttribute(element, 'autoplay', config.autoplay)
  setFlagAttribute(element, 'loop', config.loop)
  setFlagAttribute(element, 'muted', config.muted)
  element.setAttribute('preload', encodePreload(config.preload))
  element.muted = config.muted
  element.volume = clamp(config.volume, 0, 1)

  for (const source of sources) {
    const child = doc.createElement('source')
    child.setAttribute('type', getMimeType(source.type))
    child.setAttribute('src', source.url)
    element.appendChild(child)
  }

  log('created audio element', { config, sources })

  return wrapAudioElement(element)
}

/** Wrap an existing element, or return undefined when it is not an `<audio>` element */
export function asAudioHandle(element: Element): AudioHandle | undefined {
  return isAudioElement(element) ? wrapAudioElement(element) : undefined
}
