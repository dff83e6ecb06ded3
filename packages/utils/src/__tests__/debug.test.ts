import { afterEach, describe, expect, it, vi } from 'vitest'
import { debug } from '../debug'

describe('debug', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes output with its title while enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    debug('audio:test', true)('seek', { target: 'end' })

    expect(log).toHaveBeenCalledWith('[audio:test]', 'seek', { target: 'end' })
  })

  it('stays silent while disabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    debug('audio:test', false)('seek')

    expect(log).not.toHaveBeenCalled()
  })

  it('warns even while disabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = new Error('blocked')

    debug('audio:test', false).warn('playback did not start', error)

    expect(warn).toHaveBeenCalledWith('[audio:test]', 'playback did not start', error)
  })
})
