/**
 * Polling loop utility
 *
 * Encapsulates requestAnimationFrame loop management with proper cleanup.
 * Falls back to setInterval where requestAnimationFrame isn't available,
 * or when a fixed interval is requested.
 */

export interface Loop {
  /** Whether the loop is currently running */
  readonly isRunning: boolean
  /** Start the loop (no-op if already running) */
  start(): void
  /** Stop the loop (no-op if already stopped) */
  stop(): void
}

export interface LoopOptions {
  /** Tick every `interval` ms instead of once per animation frame */
  interval?: number
}

// ~60fps when animation frames are unavailable
const FALLBACK_INTERVAL_MS = 16

/**
 * Create a polling loop.
 *
 * Uses requestAnimationFrame when available, setInterval otherwise.
 *
 * @param callback - Called every tick while running. Receives the loop instance
 *                   so it can call loop.stop() to self-terminate.
 *
 * @example
 * ```ts
 * const loop = createLoop(() => render(handle.getCurrentTime()))
 *
 * loop.start()
 * // later...
 * loop.stop()
 * ```
 */
export function createLoop(callback: (loop: Loop) => void, options: LoopOptions = {}): Loop {
  const useFrames = options.interval === undefined && typeof requestAnimationFrame !== 'undefined'
  const interval = options.interval ?? FALLBACK_INTERVAL_MS

  let cancel: (() => void) | null = null
  // Set while a frame is queued, so a stop()/start() from inside the callback doesn't fork the chain
  let frameQueued = false

  function scheduleFrame(): void {
    const id = requestAnimationFrame(tick)
    frameQueued = true
    cancel = () => {
      cancelAnimationFrame(id)
      frameQueued = false
    }
  }

  function tick(): void {
    frameQueued = false
    callback(loop)
    // Only continue if still running (callback might have called stop())
    if (cancel !== null && !frameQueued) {
      scheduleFrame()
    }
  }

  const loop: Loop = {
    get isRunning() {
      return cancel !== null
    },

    start() {
      if (cancel !== null) return
      if (useFrames) {
        scheduleFrame()
      } else {
        const id = setInterval(() => callback(loop), interval)
        cancel = () => clearInterval(id)
      }
    },

    stop() {
      if (cancel === null) return
      cancel()
      cancel = null
    },
  }

  return loop
}
