import { formatSrtTimestamp, renderCueLines } from './formatting'
import type { GeneratorOptions } from './types'

/**
 * Generate SubRip (SRT) format captions.
 *
 * SRT format:
 * 1
 * 00:00:00,000 --> 00:00:01,200
 * Hello world this
 *
 * 2
 * 00:00:01,200 --> 00:00:01,800
 * is a test
 */
export function generateSrt(options: GeneratorOptions): string {
  const lines: string[] = []

  for (const cue of options.cues) {
    lines.push(cue.index.toString())
    lines.push(
      `${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}`,
    )
    lines.push(...renderCueLines(cue, options))
    lines.push('')
  }

  return lines.join('\n')
}
