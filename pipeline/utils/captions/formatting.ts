import { SerializationError } from '../../errors'
import type { Cue } from '../../types'
import type { RenderOptions } from './types'

/**
 * Format seconds as HH:MM:SS<separator>mmm.
 * Fractions below a millisecond are dropped; a tiny tolerance keeps values
 * like 1.005 (stored as 1.00499999...) on their intended millisecond.
 */
function formatTimestamp(seconds: number, separator: string): string {
  const totalMs = Math.floor(Math.max(0, seconds) * 1000 + 1e-6)
  const hours = Math.floor(totalMs / 3600000)
  const minutes = Math.floor((totalMs % 3600000) / 60000)
  const secs = Math.floor((totalMs % 60000) / 1000)
  const ms = totalMs % 1000

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}${separator}${ms.toString().padStart(3, '0')}`
}

/**
 * Format seconds to VTT timestamp: HH:MM:SS.mmm
 * VTT uses a period for milliseconds separator.
 */
export function formatVttTimestamp(seconds: number): string {
  return formatTimestamp(seconds, '.')
}

/**
 * Format seconds to SRT timestamp: HH:MM:SS,mmm
 * SRT uses a comma for milliseconds separator (French origin).
 */
export function formatSrtTimestamp(seconds: number): string {
  return formatTimestamp(seconds, ',')
}

/**
 * Escape HTML special characters to prevent tag conflicts in VTT/SRT.
 * This also neutralizes any `-->` inside the text.
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

/**
 * Collapse line breaks (and the whitespace around them) into a single space.
 * A line break inside a cue line could produce a blank line, which ends the cue.
 */
export function collapseLineBreaks(text: string): string {
  return text.replace(/\s*[\r\n]+\s*/g, ' ').trim()
}

/**
 * Render the text lines of a cue for SRT or VTT output.
 *
 * @throws {SerializationError} in strict mode, when a line contains a line break
 */
export function renderCueLines(cue: Cue, options: RenderOptions = {}): string[] {
  return cue.lines.map((line) => {
    const collapsed = collapseLineBreaks(line)
    if (collapsed !== line) {
      if (options.strict) {
        throw new SerializationError(
          `Cue ${cue.index} contains a line break inside a text line`,
          { cueIndex: cue.index, line },
        )
      }
      options.onSanitize?.({
        cueIndex: cue.index,
        original: line,
        sanitized: collapsed,
      })
    }
    return escapeHtml(collapsed)
  })
}
