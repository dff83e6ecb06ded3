export { debug, type Logger } from './debug'

export { isFiniteNumber } from './guards'

export { clamp } from './math'

// Animation loop
export { createLoop, type Loop, type LoopOptions } from './loop'
