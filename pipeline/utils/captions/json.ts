import type { GeneratorOptions } from './types'

/**
 * Simplified JSON caption cue.
 */
interface JsonCaptionCue {
  index: number
  start: number
  end: number
  text: string
  lines: string[]
}

/**
 * Simplified JSON captions result.
 */
interface JsonCaptionsResult {
  cues: JsonCaptionCue[]
}

/**
 * Generate simplified JSON format captions.
 * JSON escaping makes any text safe, so lines are written as they are.
 *
 * Output format:
 * {
 *   "cues": [
 *     { "index": 1, "start": 0, "end": 1.2, "text": "Hello world this", "lines": ["Hello world this"] }
 *   ]
 * }
 */
export function generateJson(options: GeneratorOptions): string {
  const result: JsonCaptionsResult = {
    cues: options.cues.map((cue) => ({
      index: cue.index,
      start: cue.start,
      end: cue.end,
      text: cue.lines.join('\n'),
      lines: [...cue.lines],
    })),
  }
  return JSON.stringify(result, null, 2)
}
