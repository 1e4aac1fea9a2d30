import type { Logger } from '@aws-lambda-powertools/logger'
import type {
  CaptionFormat,
  CaptionsConfig,
  PipelineConfigProcessed,
} from '@cuesmith/config'
import { logger as defaultLogger } from './logger'
import { buildCues, type CueBuilderStats } from './steps/cue-builder'
import { layout } from './steps/line-layout'
import { segment } from './steps/segmenter'
import { toWordStream, type WordStreamStats } from './steps/word-stream'
import type {
  Cue,
  LaidOutUnit,
  TimingAnomaly,
  WhisperResult,
  WordStream,
} from './types'
import { formatCues, type SanitizedLine } from './utils/captions'

export interface PipelineOptions {
  /** Logger to report progress and anomalies to (default: the shared logger) */
  logger?: Logger
}

export interface CaptionGenerationResult {
  cues: Cue[]
  anomalies: TimingAnomaly[]
  stats: CueBuilderStats & { units: number }
}

export interface PipelineResult {
  /** Rendered captions, one entry per configured format */
  outputs: Partial<Record<CaptionFormat, string>>
  cues: Cue[]
  anomalies: TimingAnomaly[]
  sanitized: SanitizedLine[]
  stats: {
    wordStream: WordStreamStats
    captions: CaptionGenerationResult['stats']
  }
}

/**
 * Turn a word stream into timed cues: segment, lay out, then time every unit.
 * Timing anomalies never stop the run; they are logged and returned.
 */
export function generateCaptions(
  words: WordStream,
  config: CaptionsConfig,
  options: PipelineOptions = {},
): CaptionGenerationResult {
  const log = options.logger ?? defaultLogger

  const units = segment(words, config.mode, config.maxWords, {
    maxChars: config.maxChars,
  })
  const laidOut: LaidOutUnit[] = units.map((unit) => ({
    unit,
    layout: layout(unit, config.multiline),
  }))
  const { cues, anomalies, stats } = buildCues(laidOut, {
    minDisplayDuration: config.minDisplayDuration,
    endPadding: config.endPadding,
    compactOverlaps: config.compactOverlaps,
  })

  for (const anomaly of anomalies) {
    log.warn('Timing anomaly', { ...anomaly })
  }
  log.info('Generated cues', {
    mode: config.mode,
    words: words.length,
    units: units.length,
    ...stats,
  })

  return { cues, anomalies, stats: { ...stats, units: units.length } }
}

/**
 * Run the whole captioning pipeline on recognizer output and render every
 * configured format.
 */
export function runPipeline(
  result: WhisperResult,
  config: PipelineConfigProcessed,
  options: PipelineOptions = {},
): PipelineResult {
  const log = options.logger ?? defaultLogger

  const { words, stats: wordStreamStats } = toWordStream(result)
  log.info('Built word stream', { ...wordStreamStats })

  const { cues, anomalies, stats } = generateCaptions(
    words,
    config.captions,
    options,
  )

  const sanitized: SanitizedLine[] = []
  const outputs: Partial<Record<CaptionFormat, string>> = {}
  for (const format of config.output.formats) {
    outputs[format] = formatCues(cues, format, {
      strict: config.output.strictSerialization,
      onSanitize: (line) => {
        sanitized.push(line)
        log.warn('Sanitized cue text', { format, ...line })
      },
    })
  }

  return {
    outputs,
    cues,
    anomalies,
    sanitized,
    stats: { wordStream: wordStreamStats, captions: stats },
  }
}

export { InvalidConfigurationError, SerializationError } from './errors'
export type * from './types'
