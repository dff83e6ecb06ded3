/**
 * Attribute Codec
 *
 * Boolean attributes go on the wire as the string "true" when set and are
 * removed when cleared. Any present attribute reads as set, as in HTML.
 * Preload levels are written as their lowercase names.
 */

import type { AudioPreload } from './types'

/** "true" for set flags, null (remove the attribute) for cleared ones */
export function encodeFlag(value: boolean): 'true' | null {
  return value ? 'true' : null
}

/** Present attributes decode as true, whatever their value */
export function decodeFlag(value: string | null): boolean {
  return value !== null
}

export function encodePreload(value: AudioPreload): string {
  return value
}

/** Write a boolean attribute using the flag encoding */
export function setFlagAttribute(element: Element, name: string, value: boolean): void {
  const encoded = encodeFlag(value)
  if (encoded === null) {
    element.removeAttribute(name)
  } else {
    element.setAttribute(name, encoded)
  }
}

export function getFlagAttribute(element: Element, name: string): boolean {
  return decodeFlag(element.getAttribute(name))
}
