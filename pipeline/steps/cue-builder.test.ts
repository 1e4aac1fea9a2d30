import { describe, expect, it } from 'vitest'
import { InvalidConfigurationError } from '../errors'
import type { LaidOutUnit, Word } from '../types'
import { buildCues } from './cue-builder'
import { layout } from './line-layout'

const MIN = 0.5

function laidOut(words: Word[], multiline = false): LaidOutUnit {
  const unit = { words }
  return { unit, layout: layout(unit, multiline) }
}

function w(text: string, start: number, end: number): Word {
  return { text, start, end }
}

describe('buildCues', () => {
  describe('timing', () => {
    it('should span from the first word start to the last word end', () => {
      const { cues } = buildCues(
        [laidOut([w('Hello', 0, 0.4), w('world', 0.4, 0.9), w('this', 1.0, 1.2)])],
        { minDisplayDuration: MIN },
      )

      expect(cues).toHaveLength(1)
      expect(cues[0].start).toBe(0)
      expect(cues[0].end).toBe(1.2)
    })

    it('should extend cues shorter than the minimum display duration', () => {
      const { cues, stats, anomalies } = buildCues(
        [laidOut([w('a', 1.3, 1.35)])],
        { minDisplayDuration: MIN },
      )

      expect(cues[0].start).toBe(1.3)
      expect(cues[0].end).toBeCloseTo(1.8, 9)
      expect(stats.extended).toBe(1)
      expect(anomalies).toEqual([])
    })

    it('should extend zero-duration words', () => {
      const { cues } = buildCues([laidOut([w('2026.', 1.772, 1.772)])], {
        minDisplayDuration: MIN,
      })

      expect(cues[0].end).toBeCloseTo(2.272, 9)
    })

    it('should keep every extended cue on screen for at least the minimum', () => {
      for (let i = 0; i < 2000; i++) {
        const start = i * 0.01
        const { cues } = buildCues([laidOut([w('tick', start, start)])], {
          minDisplayDuration: MIN,
        })

        expect(cues[0].end - cues[0].start).toBeGreaterThanOrEqual(MIN)
        expect(cues[0].end - start).toBeLessThan(MIN + 1e-9)
      }
    })

    it('should keep clamped inverted cues on screen for at least the minimum', () => {
      for (let i = 0; i < 2000; i++) {
        const start = i * 0.01 + 0.5
        const { cues } = buildCues(
          [laidOut([w('tick', start, start), w('tock', 0.1, 0.2)])],
          { minDisplayDuration: 0.3 },
        )

        expect(cues[0].end - cues[0].start).toBeGreaterThanOrEqual(0.3)
      }
    })

    it('should add end padding', () => {
      const { cues } = buildCues([laidOut([w('Hello', 0, 1)])], {
        minDisplayDuration: MIN,
        endPadding: 0.08,
      })

      expect(cues[0].end).toBeCloseTo(1.08, 9)
    })

    it('should clamp and report inverted timing', () => {
      const { cues, anomalies, stats } = buildCues(
        [laidOut([w('Hello', 2, 2.5), w('world', 1.8, 1.9)])],
        { minDisplayDuration: MIN },
      )

      expect(cues[0].start).toBe(2)
      expect(cues[0].end).toBe(2.5)
      expect(anomalies).toEqual([
        { kind: 'inverted', cueIndex: 1, start: 2, end: 1.9 },
      ])
      expect(stats.inverted).toBe(1)
      expect(stats.extended).toBe(0)
    })
  })

  describe('overlaps', () => {
    it('should report overlapping source timestamps without moving the start', () => {
      const { cues, anomalies } = buildCues(
        [laidOut([w('Hello', 0, 1.0)]), laidOut([w('world', 0.8, 1.6)])],
        { minDisplayDuration: MIN },
      )

      expect(cues[1].start).toBe(0.8)
      expect(anomalies).toEqual([
        {
          kind: 'overlap',
          cueIndex: 2,
          start: 0.8,
          end: 1.6,
          previousEnd: 1.0,
          cause: 'source',
        },
      ])
    })

    it('should report overlaps caused by the minimum duration extension', () => {
      const { cues, anomalies } = buildCues(
        [laidOut([w('Hello', 0, 0.2)]), laidOut([w('world', 0.3, 1.0)])],
        { minDisplayDuration: MIN },
      )

      expect(cues[0].end).toBe(0.5)
      expect(cues[1].start).toBe(0.3)
      expect(anomalies).toHaveLength(1)
      expect(anomalies[0].cause).toBe('extension')
      expect(anomalies[0].previousEnd).toBe(0.5)
    })

    it('should not report cues that touch', () => {
      const { anomalies } = buildCues(
        [laidOut([w('Hello', 0, 1)]), laidOut([w('world', 1, 2)])],
        { minDisplayDuration: MIN },
      )

      expect(anomalies).toEqual([])
    })

    it('should pull back overlapping ends when compaction is enabled', () => {
      const { cues, stats } = buildCues(
        [laidOut([w('Hello', 0, 0.2)]), laidOut([w('world', 0.3, 1.0)])],
        { minDisplayDuration: MIN, compactOverlaps: true },
      )

      expect(cues[0].end).toBe(0.3)
      expect(cues[1].end).toBe(1.0)
      expect(stats.compacted).toBe(1)
    })

    it('should not compact when the next cue starts at the same time', () => {
      const { cues, stats } = buildCues(
        [laidOut([w('Hello', 1, 1.2)]), laidOut([w('world', 1, 1.4)])],
        { minDisplayDuration: MIN, compactOverlaps: true },
      )

      expect(cues[0].end).toBe(1.5)
      expect(stats.compacted).toBe(0)
    })
  })

  describe('indices and text', () => {
    it('should number cues from 1 without gaps', () => {
      const units = [0, 1, 2, 3].map((i) => laidOut([w(`w${i}`, i, i + 1)]))

      const { cues } = buildCues(units, { minDisplayDuration: MIN })

      expect(cues.map((c) => c.index)).toEqual([1, 2, 3, 4])
    })

    it('should render one text line per layout line', () => {
      const { cues } = buildCues(
        [laidOut([w('one', 0, 1), w('two', 1, 2), w('three', 2, 3)], true)],
        { minDisplayDuration: MIN },
      )

      expect(cues[0].lines).toEqual(['one two', 'three'])
      expect(cues[0].words.map((x) => x.text)).toEqual(['one', 'two', 'three'])
    })

    it('should return frozen cues', () => {
      const { cues } = buildCues([laidOut([w('Hello', 0, 1)])], {
        minDisplayDuration: MIN,
      })

      expect(Object.isFrozen(cues[0])).toBe(true)
    })

    it('should return no cues for no units', () => {
      const result = buildCues([], { minDisplayDuration: MIN })

      expect(result.cues).toEqual([])
      expect(result.stats.cues).toBe(0)
    })
  })

  describe('invalid input', () => {
    it('should reject an empty unit', () => {
      expect(() =>
        buildCues([{ unit: { words: [] }, layout: { lines: [] } }], {
          minDisplayDuration: MIN,
        }),
      ).toThrow(InvalidConfigurationError)
    })

    it('should reject a layout that drops words', () => {
      const words = [w('Hello', 0, 1), w('world', 1, 2)]

      expect(() =>
        buildCues([{ unit: { words }, layout: { lines: [[words[0]]] } }], {
          minDisplayDuration: MIN,
        }),
      ).toThrow(InvalidConfigurationError)
    })

    it('should reject a non-positive minimum display duration', () => {
      expect(() => buildCues([], { minDisplayDuration: 0 })).toThrow(
        InvalidConfigurationError,
      )
    })

    it('should reject negative end padding', () => {
      expect(() =>
        buildCues([], { minDisplayDuration: MIN, endPadding: -1 }),
      ).toThrow(InvalidConfigurationError)
    })
  })
})
