import { formatVttTimestamp, renderCueLines } from './formatting'
import type { GeneratorOptions } from './types'

/**
 * Generate WebVTT format captions.
 *
 * VTT format:
 * WEBVTT
 *
 * 00:00:00.000 --> 00:00:01.200
 * Hello world this
 *
 * 00:00:01.200 --> 00:00:01.800
 * is a test
 */
export function generateVtt(options: GeneratorOptions): string {
  const lines: string[] = ['WEBVTT', '']

  for (const cue of options.cues) {
    lines.push(
      `${formatVttTimestamp(cue.start)} --> ${formatVttTimestamp(cue.end)}`,
    )
    lines.push(...renderCueLines(cue, options))
    lines.push('')
  }

  return lines.join('\n')
}
