import * as v from 'valibot'

const DEFAULT_VOLUME = 0

/** Schema for the settings consumed when an audio element is created */
export const AudioSettingsSchema = v.object({
  /** Show native controls */
  controls: v.optional(v.boolean(), false),
  /** Start playing as soon as possible */
  autoplay: v.optional(v.boolean(), false),
  /** Restart from the beginning upon completion */
  loop: v.optional(v.boolean(), false),
  /** How much audio to fetch before playback */
  preload: v.optional(v.picklist(['none', 'metadata', 'auto']), 'auto'),
  /** Initially muted */
  muted: v.optional(v.boolean(), false),
  /** Initial volume, clamped to [0, 1] when applied. NaN falls back to 0. */
  volume: v.optional(
    v.pipe(
      v.union([v.number(), v.nan()]),
      v.transform(volume => (Number.isNaN(volume) ? DEFAULT_VOLUME : volume)),
    ),
    DEFAULT_VOLUME,
  ),
})

export type AudioSettingsInput = v.InferInput<typeof AudioSettingsSchema>
export type AudioSettings = Readonly<v.InferOutput<typeof AudioSettingsSchema>>

/**
 * Complete partial settings with defaults.
 * Throws a `ValiError` when a given value has the wrong type.
 * A NaN volume is not an error: it resolves to the default.
 */
export function resolveAudioSettings(input: AudioSettingsInput = {}): AudioSettings {
  return Object.freeze(v.parse(AudioSettingsSchema, input))
}

export const DEFAULT_AUDIO_SETTINGS: AudioSettings = resolveAudioSettings()
