import { InvalidConfigurationError } from '../errors'
import type { Cue, LaidOutUnit, TimingAnomaly, Word } from '../types'

/**
 * Timing options for cue building
 */
export interface CueBuilderOptions {
  /** Minimum time a cue stays on screen, in seconds */
  minDisplayDuration: number
  /** Seconds added to the end of every cue (default: 0) */
  endPadding?: number
  /** Pull back cue ends that run past the next cue's start (default: false) */
  compactOverlaps?: boolean
}

/**
 * Stats returned by the cue builder
 */
export interface CueBuilderStats {
  /** Number of cues built */
  cues: number
  /** Cues extended to reach the minimum display duration */
  extended: number
  /** Cues whose words end before they start */
  inverted: number
  /** Cues starting before the previous cue ends */
  overlaps: number
  /** Cues shortened by the compaction pass */
  compacted: number
}

export interface CueBuildResult {
  cues: Cue[]
  anomalies: TimingAnomaly[]
  stats: CueBuilderStats
}

interface DraftCue {
  index: number
  start: number
  end: number
  words: readonly Word[]
  lines: string[]
}

/**
 * Check the timing options are usable.
 */
function validateOptions(options: CueBuilderOptions): void {
  const { minDisplayDuration, endPadding = 0 } = options
  if (!Number.isFinite(minDisplayDuration) || minDisplayDuration <= 0) {
    throw new InvalidConfigurationError(
      `minDisplayDuration must be a positive number, got ${minDisplayDuration}`,
    )
  }
  if (!Number.isFinite(endPadding) || endPadding < 0) {
    throw new InvalidConfigurationError(
      `endPadding must be a non-negative number, got ${endPadding}`,
    )
  }
}

/**
 * The earliest end that keeps a cue on screen for `minDisplayDuration`.
 * `start + minDisplayDuration` can round below the target once subtracted
 * again, so the sum is nudged up one step at a time until it doesn't.
 */
function extendedEnd(start: number, minDisplayDuration: number): number {
  let end = start + minDisplayDuration
  while (end - start < minDisplayDuration) {
    end += Number.EPSILON * Math.max(1, end)
  }
  return end
}

/**
 * Pull back each cue's end to the start of the next cue when they overlap.
 * Cues whose successor starts at or before their own start are left alone.
 */
function compact(drafts: DraftCue[]): number {
  let compacted = 0
  for (let i = 0; i < drafts.length - 1; i++) {
    const current = drafts[i]
    const next = drafts[i + 1]
    if (current.end > next.start && next.start > current.start) {
      current.end = next.start
      compacted++
    }
  }
  return compacted
}

/**
 * Assign final timing and indices to laid-out caption units.
 *
 * - start is the first word's start, end is the last word's end (plus `endPadding`)
 * - an end before the start is reported as 'inverted' and replaced by
 *   `start + minDisplayDuration`
 * - shorter cues are extended to `minDisplayDuration`
 * - a cue starting before the previous cue's end is reported as 'overlap';
 *   its start is never moved
 *
 * Overlaps created by the extension are tolerated unless `compactOverlaps` is set.
 *
 * @throws {InvalidConfigurationError} on an empty unit, a layout that doesn't
 *   match its unit, or unusable timing options
 */
export function buildCues(
  units: readonly LaidOutUnit[],
  options: CueBuilderOptions,
): CueBuildResult {
  validateOptions(options)
  const { minDisplayDuration, endPadding = 0, compactOverlaps = false } = options

  const stats: CueBuilderStats = {
    cues: 0,
    extended: 0,
    inverted: 0,
    overlaps: 0,
    compacted: 0,
  }
  const anomalies: TimingAnomaly[] = []
  const drafts: DraftCue[] = []

  let previousEnd: number | undefined
  let previousSourceEnd: number | undefined

  units.forEach(({ unit, layout }, i) => {
    const { words } = unit
    if (words.length === 0) {
      throw new InvalidConfigurationError(
        `Caption unit ${i + 1} has no words`,
      )
    }
    const laidOutWords = layout.lines.reduce((n, line) => n + line.length, 0)
    if (laidOutWords !== words.length) {
      throw new InvalidConfigurationError(
        `Layout of caption unit ${i + 1} has ${laidOutWords} words, expected ${words.length}`,
      )
    }

    const index = i + 1
    const start = words[0].start
    const sourceEnd = words[words.length - 1].end
    let end = sourceEnd + endPadding

    if (sourceEnd < start) {
      anomalies.push({ kind: 'inverted', cueIndex: index, start, end: sourceEnd })
      stats.inverted++
      end = extendedEnd(start, minDisplayDuration)
    } else if (end - start < minDisplayDuration) {
      end = extendedEnd(start, minDisplayDuration)
      stats.extended++
    }

    if (previousEnd !== undefined && start < previousEnd) {
      anomalies.push({
        kind: 'overlap',
        cueIndex: index,
        start,
        end: sourceEnd,
        previousEnd,
        cause:
          previousSourceEnd !== undefined && start < previousSourceEnd
            ? 'source'
            : 'extension',
      })
      stats.overlaps++
    }

    drafts.push({
      index,
      start,
      end,
      words,
      lines: layout.lines.map((line) => line.map((w) => w.text).join(' ')),
    })

    previousEnd = end
    previousSourceEnd = sourceEnd
  })

  if (compactOverlaps) {
    stats.compacted = compact(drafts)
  }

  const cues: Cue[] = drafts.map((draft) =>
    Object.freeze({ ...draft, lines: Object.freeze(draft.lines) }),
  )
  stats.cues = cues.length

  return { cues, anomalies, stats }
}
