import { InvalidConfigurationError } from '../errors'
import type { CaptionUnit, LineBlock } from '../types'

/**
 * Lay out the words of a caption unit on screen.
 *
 * With `multiline` off every word goes on a single line, however long.
 * With `multiline` on the words are split over two lines at `ceil(k / 2)`,
 * so the first line takes the extra word when the count is odd.
 * A single word is always one line.
 *
 * @throws {InvalidConfigurationError} if the unit has no words
 */
export function layout(unit: CaptionUnit, multiline: boolean): LineBlock {
  const { words } = unit
  if (words.length === 0) {
    throw new InvalidConfigurationError('Cannot lay out an empty caption unit')
  }

  if (!multiline || words.length === 1) {
    return Object.freeze({ lines: Object.freeze([words]) })
  }

  const splitAt = Math.ceil(words.length / 2)
  return Object.freeze({
    lines: Object.freeze([
      Object.freeze(words.slice(0, splitAt)),
      Object.freeze(words.slice(splitAt)),
    ]),
  })
}
