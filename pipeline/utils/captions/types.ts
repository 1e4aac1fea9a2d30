import type { Cue } from '../../types'

/**
 * A cue text line that had to be changed to keep the output well formed.
 */
export interface SanitizedLine {
  /** Index of the cue the line belongs to */
  cueIndex: number
  /** The line as built from the words */
  original: string
  /** The line as written */
  sanitized: string
}

/**
 * Options for rendering text lines.
 */
export interface RenderOptions {
  /** Throw a SerializationError instead of sanitizing (default: false) */
  strict?: boolean
  /** Called for every line that was sanitized */
  onSanitize?: (line: SanitizedLine) => void
}

/**
 * Options passed to caption generators.
 */
export interface GeneratorOptions extends RenderOptions {
  /** The cues to serialize, in output order */
  cues: readonly Cue[]
}
