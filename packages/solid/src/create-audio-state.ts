import type { AudioHandle, AudioState } from '@tapedeck/audio'
import { createLoop, debug } from '@tapedeck/utils'
import { batch, createSignal, onCleanup, type Accessor } from 'solid-js'

const log = debug('solid:create-audio-state', false)

export interface AudioStateOptions {
  /** Poll every `interval` ms instead of once per animation frame */
  interval?: number
}

export interface AudioStateSignals {
  state: Accessor<AudioState>
  /** Volume between 0 and 1 */
  volume: Accessor<number>
  muted: Accessor<boolean>
  looping: Accessor<boolean>
  /** Duration in seconds, 0 while unknown */
  duration: Accessor<number>
  /** Playback position in seconds */
  currentTime: Accessor<number>
  /** Re-read every value from the handle */
  refresh: () => void
}

/**
 * Mirror an audio handle into signals.
 *
 * The handle exposes no events, so its values are polled while the owning
 * root is alive. Never writes to the element.
 *
 * @example
 * ```tsx
 * const audio = createAudioState(handle)
 * return <button onClick={handle.togglePlaying}>{audio.state() === 'playing' ? 'Pause' : 'Play'}</button>
 * ```
 */
export function createAudioState(
  handle: AudioHandle,
  options: AudioStateOptions = {},
): AudioStateSignals {
  const [state, setState] = createSignal(handle.getState())
  const [volume, setVolume] = createSignal(handle.getVolume())
  const [muted, setMuted] = createSignal(handle.isMute())
  const [looping, setLooping] = createSignal(handle.isLooping())
  const [duration, setDuration] = createSignal(handle.getDuration())
  const [currentTime, setCurrentTime] = createSignal(handle.getCurrentTime())

  function refresh() {
    batch(() => {
      setState(handle.getState())
      setVolume(handle.getVolume())
      setMuted(handle.isMute())
      setLooping(handle.isLooping())
      setDuration(handle.getDuration())
      setCurrentTime(handle.getCurrentTime())
    })
  }

  const loop = createLoop(refresh, { interval: options.interval })
  loop.start()
  log('polling started', { interval: options.interval ?? 'frame' })

  onCleanup(() => {
    loop.stop()
    log('polling stopped')
  })

  return { state, volume, muted, looping, duration, currentTime, refresh }
}
