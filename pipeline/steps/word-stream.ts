import { z } from 'zod'
import { InvalidConfigurationError } from '../errors'
import type {
  TranscriptChunk,
  WhisperResult,
  WhisperSegment,
  WhisperWord,
  Word,
  WordStream,
} from '../types'

/**
 * Schemas for the recognizer JSON output. Unknown fields (tokens, temperature, ...) are kept.
 */
export const WhisperWordSchema = z
  .object({
    word: z.string(),
    start: z.number().optional(),
    end: z.number().optional(),
    probability: z.number().optional(),
  })
  .loose()

export const WhisperSegmentSchema = z
  .object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
    words: z.array(WhisperWordSchema).optional(),
  })
  .loose()

export const WhisperResultSchema = z
  .object({
    segments: z.array(WhisperSegmentSchema),
  })
  .loose()

/**
 * Stats returned when building a word stream
 */
export interface WordStreamStats {
  /** Recognizer segments read */
  segments: number
  /** Words in the resulting stream */
  words: number
  /** Tokens dropped because their text was empty */
  skippedEmpty: number
  /** Adjacent exact duplicates dropped */
  duplicatesDropped: number
  /** Words that changed position when sorting by start time */
  reordered: number
  /** Words whose timing was distributed from their segment */
  distributed: number
}

/**
 * Create an immutable word.
 * Negative times are clamped to 0. An inverted range is kept as-is: the cue builder reports it.
 */
export function createWord(
  text: string,
  start: number,
  end: number,
  segment?: number,
): Word {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    throw new InvalidConfigurationError('Word text must not be empty')
  }
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new InvalidConfigurationError(
      `Word "${trimmed}" has non-finite timing`,
      { start, end },
    )
  }

  const word: Word =
    segment === undefined
      ? { text: trimmed, start: Math.max(0, start), end: Math.max(0, end) }
      : {
          text: trimmed,
          start: Math.max(0, start),
          end: Math.max(0, end),
          segment,
        }
  return Object.freeze(word)
}

/**
 * Check if two words are the same recognizer output repeated.
 */
function isDuplicate(a: Word, b: Word): boolean {
  return a.text === b.text && a.start === b.start && a.end === b.end
}

/**
 * Split the text of a segment without word timestamps into untimed tokens.
 */
function splitSegmentText(text: string): WhisperWord[] {
  return text
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => ({ word: token }))
}

/**
 * Turn the tokens of one segment into words, distributing the segment's
 * duration evenly to tokens missing timing data.
 */
function segmentToWords(
  tokens: WhisperWord[],
  segment: WhisperSegment,
  segmentIndex: number,
  stats: WordStreamStats,
): Word[] {
  const duration = Math.max(0, segment.end - segment.start)
  const wordDuration = duration / tokens.length

  return tokens.map((token, i) => {
    if (token.start === undefined || token.end === undefined) {
      stats.distributed++
    }
    const start = token.start ?? segment.start + i * wordDuration
    const end = token.end ?? segment.start + (i + 1) * wordDuration
    return createWord(token.word, start, end, segmentIndex)
  })
}

/**
 * Build a word stream from the recognizer output.
 *
 * Segments carrying word timestamps contribute their words directly. Segments
 * without them are split on whitespace and their duration is shared evenly
 * between the tokens. The stream is then sorted by start time (stable) and
 * adjacent exact duplicates are dropped.
 *
 * @param result - Recognizer output
 * @returns The word stream and stats about the cleanup
 */
export function toWordStream(result: WhisperResult): {
  words: WordStream
  stats: WordStreamStats
} {
  const stats: WordStreamStats = {
    segments: result.segments.length,
    words: 0,
    skippedEmpty: 0,
    duplicatesDropped: 0,
    reordered: 0,
    distributed: 0,
  }

  const collected: Word[] = []

  result.segments.forEach((segment, segmentIndex) => {
    const rawTokens =
      segment.words && segment.words.length > 0
        ? segment.words
        : splitSegmentText(segment.text)
    const tokens = rawTokens.filter((token) => token.word.trim().length > 0)
    stats.skippedEmpty += rawTokens.length - tokens.length

    if (tokens.length === 0) {
      return
    }
    collected.push(...segmentToWords(tokens, segment, segmentIndex, stats))
  })

  const sorted = [...collected].sort((a, b) => a.start - b.start)
  stats.reordered = sorted.filter((word, i) => word !== collected[i]).length

  const words: Word[] = []
  for (const word of sorted) {
    const previous = words[words.length - 1]
    if (previous && isDuplicate(previous, word)) {
      stats.duplicatesDropped++
      continue
    }
    words.push(word)
  }

  stats.words = words.length
  return { words: Object.freeze(words), stats }
}

/**
 * Shift a time by an offset, keeping missing values missing.
 */
function shift(time: number | undefined, offset: number): number | undefined {
  return time === undefined ? undefined : time + offset
}

/**
 * Merge the transcriptions of consecutive audio chunks into one result.
 * Every chunk's timestamps are shifted by the total duration of the chunks before it.
 */
export function stitchChunks(chunks: readonly TranscriptChunk[]): WhisperResult {
  const segments: WhisperSegment[] = []
  let offset = 0

  for (const chunk of chunks) {
    for (const segment of chunk.result.segments) {
      const shifted: WhisperSegment = {
        ...segment,
        start: segment.start + offset,
        end: segment.end + offset,
      }
      if (segment.words) {
        shifted.words = segment.words.map((word) => ({
          ...word,
          start: shift(word.start, offset),
          end: shift(word.end, offset),
        }))
      }
      segments.push(shifted)
    }
    offset += chunk.duration
  }

  return { segments }
}

/**
 * Validate untrusted recognizer JSON.
 */
export function parseWhisperResult(value: unknown): WhisperResult {
  const parsed = WhisperResultSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Transcript is not a valid recognizer result',
      parsed.error.issues,
    )
  }
  return parsed.data
}
