import type { CaptionFormat } from '@cuesmith/config'
import type { Cue } from '../../types'
import { generateJson } from './json'
import { generateSrt } from './srt'
import type { RenderOptions } from './types'
import { generateVtt } from './vtt'

export { generateJson } from './json'
export { generateSrt } from './srt'
export type { GeneratorOptions, RenderOptions, SanitizedLine } from './types'
export { generateVtt } from './vtt'

/**
 * Serialize cues in the given format.
 * Identical cues always produce byte-identical output.
 */
export function formatCues(
  cues: readonly Cue[],
  format: CaptionFormat,
  options: RenderOptions = {},
): string {
  switch (format) {
    case 'srt':
      return generateSrt({ ...options, cues })
    case 'vtt':
      return generateVtt({ ...options, cues })
    case 'json':
      return generateJson({ ...options, cues })
  }
}
