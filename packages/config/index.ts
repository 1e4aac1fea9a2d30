import { z } from 'zod'

/**
 * Caption granularity.
 *  - `'word'`: one cue per word
 *  - `'line'`: up to `maxWords` words per cue
 *  - `'segment'`: one cue per recognizer segment
 */
export const CaptionModeSchema = z.enum(['word', 'line', 'segment'])

export type CaptionMode = z.infer<typeof CaptionModeSchema>

/**
 * Schema for caption segmentation and timing configuration.
 */
export const CaptionsConfigSchema = z.object({
  /** Grouping granularity (default: 'line') */
  mode: CaptionModeSchema.default('line'),
  /** Maximum words per cue in line mode (default: 5) */
  maxWords: z.number().int().min(1).default(5),
  /** Optional maximum characters per cue in line mode, spaces included */
  maxChars: z.number().int().min(1).optional(),
  /** Allow cues to wrap over two lines (default: false = always a single line) */
  multiline: z.boolean().default(false),
  /** Minimum time a cue stays on screen, in seconds (default: 0.5) */
  minDisplayDuration: z.number().positive().default(0.5),
  /** Seconds added to every cue end so the last word isn't cut early (default: 0) */
  endPadding: z.number().min(0).default(0),
  /**
   * If true, pulls back a cue's end to the next cue's start when they overlap (default: false)
   * NOTE: this can make a cue shorter than `minDisplayDuration`.
   */
  compactOverlaps: z.boolean().default(false),
})

/**
 * Configuration for caption segmentation and timing.
 */
export type CaptionsConfig = z.infer<typeof CaptionsConfigSchema>

/**
 * Supported output formats.
 */
export const CaptionFormatSchema = z.enum(['srt', 'vtt', 'json'])

export type CaptionFormat = z.infer<typeof CaptionFormatSchema>

/**
 * Schema for caption output configuration.
 */
export const OutputConfigSchema = z.object({
  /** Formats to render (default: ['srt']) */
  formats: z.array(CaptionFormatSchema).min(1).default(['srt']),
  /** Directory caption files are written to by the CLI (default: 'transcriptions') */
  outputDir: z.string().min(1).default('transcriptions'),
  /** Fail instead of sanitizing text that would corrupt cue boundaries (default: false) */
  strictSerialization: z.boolean().default(false),
})

/**
 * Configuration for caption output.
 */
export type OutputConfig = z.infer<typeof OutputConfigSchema>

/** Default values for CaptionsConfig */
const captionsDefaults: CaptionsConfig = {
  mode: 'line',
  maxWords: 5,
  maxChars: undefined,
  multiline: false,
  minDisplayDuration: 0.5,
  endPadding: 0,
  compactOverlaps: false,
}

/** Default values for OutputConfig */
const outputDefaults: OutputConfig = {
  formats: ['srt'],
  outputDir: 'transcriptions',
  strictSerialization: false,
}

/**
 * Schema for the whole captioning pipeline configuration.
 */
export const PipelineConfigSchema = z.object({
  /** Segmentation, layout and timing settings */
  captions: CaptionsConfigSchema.optional().transform((val) => ({
    ...captionsDefaults,
    ...val,
  })),

  /** Rendering settings */
  output: OutputConfigSchema.optional().transform((val) => ({
    ...outputDefaults,
    ...val,
  })),
})

/**
 * Configuration for the captioning pipeline.
 */
export type PipelineConfigProcessed = z.infer<typeof PipelineConfigSchema>
export type PipelineConfig = z.input<typeof PipelineConfigSchema>

/**
 * Allows to easily define a PipelineConfig object with proper typing (even with just JavaScript).
 * @param {PipelineConfig} config - The pipeline configuration object
 * @returns {PipelineConfig}
 */
export function defineConfig(config: PipelineConfig): PipelineConfig {
  return config
}
