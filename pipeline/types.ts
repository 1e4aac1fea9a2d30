// =============================================================================
// Whisper types (raw output from the speech recognizer)
// =============================================================================

/** A single word from Whisper output */
export interface WhisperWord {
  /** The word text, usually with a leading space */
  word: string
  /** Start time in seconds (optional - Whisper can't always detect timing) */
  start?: number
  /** End time in seconds (optional - Whisper can't always detect timing) */
  end?: number
  /** Recognition confidence */
  probability?: number
}

/** A segment from Whisper output */
export interface WhisperSegment {
  /** Start time in seconds */
  start: number
  /** End time in seconds */
  end: number
  /** Full text of the segment */
  text: string
  /** Word-level timing data, present when transcribed with word timestamps */
  words?: WhisperWord[]
}

/** Whisper raw transcription result */
export interface WhisperResult {
  /** Array of transcription segments */
  segments: WhisperSegment[]
}

/** Transcription of one audio chunk, with the chunk's duration in seconds */
export interface TranscriptChunk {
  result: WhisperResult
  duration: number
}

// =============================================================================
// Caption types
// =============================================================================

/** An atomic recognized word. Frozen once created. */
export interface Word {
  readonly text: string
  /** Start time in seconds */
  readonly start: number
  /** End time in seconds */
  readonly end: number
  /** Index of the recognizer segment the word came from */
  readonly segment?: number
}

/** Ordered, time-monotonic sequence of words */
export type WordStream = readonly Word[]

/** Words sharing a single caption cue */
export interface CaptionUnit {
  readonly words: readonly Word[]
}

/** The line layout of a caption unit: one or two non-empty lines of words */
export interface LineBlock {
  readonly lines: readonly (readonly Word[])[]
}

/** A caption unit paired with its layout, as consumed by the cue builder */
export interface LaidOutUnit {
  readonly unit: CaptionUnit
  readonly layout: LineBlock
}

/** A single timed caption entry */
export interface Cue {
  /** 1-based position in the output */
  readonly index: number
  /** Start time in seconds */
  readonly start: number
  /** End time in seconds */
  readonly end: number
  /** The words displayed by this cue, in order */
  readonly words: readonly Word[]
  /** Rendered text lines (words joined by a space) */
  readonly lines: readonly string[]
}

/** Kinds of timing problems detected in the input */
export type TimingAnomalyKind =
  | 'overlap' // cue starts before the previous cue ends
  | 'inverted' // last word ends before the first word starts

/** What pushed a cue's end past the next cue's start */
export type OverlapCause =
  | 'source' // the word timestamps themselves overlap
  | 'extension' // only the minimum-duration extension or end padding overlaps

/** A non-fatal timing diagnostic */
export interface TimingAnomaly {
  kind: TimingAnomalyKind
  /** Index of the cue the anomaly was detected on */
  cueIndex: number
  /** Cue start as derived from its words */
  start: number
  /** Cue end as derived from its words, before any correction */
  end: number
  /** End of the previous cue (for 'overlap') */
  previousEnd?: number
  /** For 'overlap' */
  cause?: OverlapCause
}
