const ENABLED = true

export interface Logger {
  /** Trace output, printed only while the logger is enabled */
  (...args: unknown[]): void
  /** Errors a module handles without rethrowing. Printed even while the logger is disabled. */
  warn: (...args: unknown[]) => void
}

/**
 * Create a debug logger that can be toggled on/off
 *
 * Usage:
 *   const log = debug("audio:make-audio-handle", true);
 *   log("seek", { target });
 *   log.warn("playback did not start", error);
 */
export function debug(title: string, enabled: boolean): Logger {
  const prefix = `[${title}]`

  function log(...args: unknown[]) {
    if (ENABLED && enabled) {
      console.log(prefix, ...args)
    }
  }

  return Object.assign(log, {
    warn: (...args: unknown[]) => {
      if (ENABLED) {
        console.warn(prefix, ...args)
      }
    },
  })
}
