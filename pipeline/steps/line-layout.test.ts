import { describe, expect, it } from 'vitest'
import { InvalidConfigurationError } from '../errors'
import type { CaptionUnit, LineBlock, Word } from '../types'
import { layout } from './line-layout'

function unitOf(...texts: string[]): CaptionUnit {
  const words: Word[] = texts.map((text, i) => ({
    text,
    start: i,
    end: i + 1,
  }))
  return { words }
}

function lineTexts(block: LineBlock): string[] {
  return block.lines.map((line) => line.map((w) => w.text).join(' '))
}

describe('layout', () => {
  describe('single line', () => {
    it('should put every word on one line', () => {
      const block = layout(unitOf('Hello', 'world', 'this', 'is'), false)

      expect(lineTexts(block)).toEqual(['Hello world this is'])
    })

    it('should keep a long unit on one line', () => {
      const texts = Array.from({ length: 30 }, (_, i) => `word${i}`)

      const block = layout(unitOf(...texts), false)

      expect(block.lines).toHaveLength(1)
      expect(block.lines[0]).toHaveLength(30)
    })
  })

  describe('multiline', () => {
    it('should split an even count in half', () => {
      const block = layout(unitOf('one', 'two', 'three', 'four'), true)

      expect(lineTexts(block)).toEqual(['one two', 'three four'])
    })

    it('should give the extra word to the first line', () => {
      const block = layout(unitOf('one', 'two', 'three'), true)

      expect(lineTexts(block)).toEqual(['one two', 'three'])
    })

    it('should split two words into two lines', () => {
      const block = layout(unitOf('one', 'two'), true)

      expect(lineTexts(block)).toEqual(['one', 'two'])
    })

    it('should keep a single word on one line', () => {
      const block = layout(unitOf('alone'), true)

      expect(lineTexts(block)).toEqual(['alone'])
    })

    it('should keep lines balanced for any word count', () => {
      for (let k = 2; k <= 11; k++) {
        const texts = Array.from({ length: k }, (_, i) => `w${i}`)
        const block = layout(unitOf(...texts), true)
        const [first, second] = block.lines

        expect(block.lines).toHaveLength(2)
        expect(first.length - second.length).toBe(k % 2)
        expect([...first, ...second].map((w) => w.text)).toEqual(texts)
      }
    })
  })

  it('should reject an empty unit', () => {
    expect(() => layout({ words: [] }, false)).toThrow(
      InvalidConfigurationError,
    )
    expect(() => layout({ words: [] }, true)).toThrow(
      InvalidConfigurationError,
    )
  })
})
