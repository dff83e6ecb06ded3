import { describe, expect, it } from 'vitest'
import {
  audioSource,
  getMimeType,
  InvalidAudioSourceError,
  makeAudioSource,
} from '../audio-source'

describe('makeAudioSource', () => {
  it.each([
    ['/sounds/theme.mp3', 'mp3'],
    ['/sounds/theme.ogg', 'ogg'],
    ['https://example.com/clips/intro.wav', 'wav'],
  ] as const)('detects the media type of %s', (url, type) => {
    expect(makeAudioSource(url)).toEqual({ type, url })
  })

  it.each(['/sounds/theme.flac', '/sounds/theme.MP3', '/sounds/theme.mp3?v=2', 'mp', ''])(
    'rejects %j',
    url => {
      expect(makeAudioSource(url)).toBeUndefined()
    },
  )

  it('returns a frozen value', () => {
    expect(Object.isFrozen(makeAudioSource('/a.ogg'))).toBe(true)
  })
})

describe('audioSource', () => {
  it('builds sources for recognized extensions', () => {
    expect(audioSource('/a.wav')).toEqual({ type: 'wav', url: '/a.wav' })
  })

  it('throws an error carrying the invalid url', () => {
    expect(() => audioSource('/a.aac')).toThrow('Not a valid audio source: /a.aac')

    let caught: unknown
    try {
      audioSource('/a.aac')
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(InvalidAudioSourceError)
    if (caught instanceof InvalidAudioSourceError) {
      expect(caught.name).toBe('InvalidAudioSourceError')
      expect(caught.url).toBe('/a.aac')
    }
  })
})

describe('getMimeType', () => {
  it('maps media types to MIME strings', () => {
    expect(getMimeType('mp3')).toBe('audio/mpeg')
    expect(getMimeType('ogg')).toBe('audio/ogg')
    expect(getMimeType('wav')).toBe('audio/wav')
  })
})
