import type { CaptionMode } from '@cuesmith/config'
import { InvalidConfigurationError } from '../errors'
import type { CaptionUnit, Word, WordStream } from '../types'

/**
 * Extra segmentation constraints
 */
export interface SegmentOptions {
  /** In line mode, also close a unit before it grows past this many characters */
  maxChars?: number
}

/**
 * Creates a caption unit from a subset of words.
 */
function createUnit(words: Word[]): CaptionUnit {
  return Object.freeze({ words: Object.freeze([...words]) })
}

/**
 * Calculate the character count of a list of words (including spaces).
 */
function calculateChars(words: Word[]): number {
  if (words.length === 0) return 0
  return words.reduce((sum, w) => sum + w.text.length, 0) + (words.length - 1)
}

/**
 * Greedy grouping: close the current unit once it holds `maxWords` words,
 * or before a word that would push it past `maxChars`.
 */
function segmentLines(
  words: WordStream,
  maxWords: number,
  maxChars: number | undefined,
): CaptionUnit[] {
  const units: CaptionUnit[] = []
  let current: Word[] = []

  for (const word of words) {
    const projectedChars =
      calculateChars(current) + (current.length > 0 ? 1 : 0) + word.text.length

    if (
      maxChars !== undefined &&
      projectedChars > maxChars &&
      current.length > 0
    ) {
      units.push(createUnit(current))
      current = []
    }

    current.push(word)

    if (current.length === maxWords) {
      units.push(createUnit(current))
      current = []
    }
  }

  if (current.length > 0) {
    units.push(createUnit(current))
  }

  return units
}

/**
 * One unit per run of consecutive words coming from the same recognizer segment.
 */
function segmentBySource(words: WordStream): CaptionUnit[] {
  const units: CaptionUnit[] = []
  let current: Word[] = []

  for (const word of words) {
    const previous = current[current.length - 1]
    if (previous && previous.segment !== word.segment) {
      units.push(createUnit(current))
      current = []
    }
    current.push(word)
  }

  if (current.length > 0) {
    units.push(createUnit(current))
  }

  return units
}

/**
 * Group a word stream into caption units.
 *
 * - `'word'`: every word is its own unit, `maxWords` is ignored
 * - `'line'`: words are taken greedily in order, `maxWords` at a time; the last
 *   unit may be shorter
 * - `'segment'`: one unit per recognizer segment, `maxWords` is ignored
 *
 * @throws {InvalidConfigurationError} if `maxWords` (or `maxChars`) is not a positive integer
 */
export function segment(
  words: WordStream,
  mode: CaptionMode,
  maxWords: number,
  options: SegmentOptions = {},
): CaptionUnit[] {
  if (!Number.isInteger(maxWords) || maxWords < 1) {
    throw new InvalidConfigurationError(
      `maxWords must be a positive integer, got ${maxWords}`,
    )
  }
  const { maxChars } = options
  if (maxChars !== undefined && (!Number.isInteger(maxChars) || maxChars < 1)) {
    throw new InvalidConfigurationError(
      `maxChars must be a positive integer, got ${maxChars}`,
    )
  }

  switch (mode) {
    case 'word':
      return words.map((word) => createUnit([word]))
    case 'segment':
      return segmentBySource(words)
    case 'line':
      return segmentLines(words, maxWords, maxChars)
  }
}
