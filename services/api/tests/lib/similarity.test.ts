import { describe, expect, it } from 'vitest'
import {
  CHAR_DIFF_MAX_LENGTH,
  classifyScore,
  compareTexts,
  lcsLength,
  ratio,
  tokenLcsLength,
  tokenSetRatio
} from '../../src/lib/similarity'

describe('similarity', () => {
  it('lcsLength and ratio follow the indel distance', () => {
    expect(lcsLength('kitten', 'sitting')).toBe(4)
    expect(lcsLength('', 'abc')).toBe(0)
    expect(ratio('abc', 'abd')).toBeCloseTo(66.667, 2)
    expect(ratio('', '')).toBe(100)
  })

  it('tokenLcsLength only counts whole words and whitespace runs', () => {
    expect(tokenLcsLength('cat sat', 'cat hat')).toBe(4)
    expect(lcsLength('cat sat', 'cat hat')).toBe(6)
  })

  it('lcsLength diffs by word once the inputs are long', () => {
    const a = 'cat sat '.repeat(700)
    const b = 'cat hat '.repeat(700)
    expect(a.length + b.length).toBeGreaterThan(CHAR_DIFF_MAX_LENGTH)
    expect(lcsLength(a, b)).toBe(3500)
  })

  it('tokenSetRatio ignores order and duplicates', () => {
    expect(tokenSetRatio('the cat sat', 'sat the cat the')).toBe(100)
  })

  it('tokenSetRatio scores a subset as a full match', () => {
    expect(tokenSetRatio('fine of 100', 'a fine of 100 rupees')).toBe(100)
  })

  it('tokenSetRatio is zero for an empty side and for unrelated tokens', () => {
    expect(tokenSetRatio('', 'anything')).toBe(0)
    expect(tokenSetRatio('   ', '   ')).toBe(0)
    expect(tokenSetRatio('abc', 'xyz')).toBe(0)
  })

  it('tokenSetRatio is case-sensitive', () => {
    expect(tokenSetRatio('Fine', 'fine')).toBe(75)
  })

  it('tokenSetRatio scores a changed amount', () => {
    expect(tokenSetRatio('A fine of 100 shall apply.', 'A fine of 500 shall apply.')).toBeCloseTo(96.1538, 3)
  })

  it('classifyScore thresholds', () => {
    expect(classifyScore(100)).toBe('Minor edit')
    expect(classifyScore(90)).toBe('Minor edit')
    expect(classifyScore(89)).toBe('Modified')
    expect(classifyScore(65)).toBe('Modified')
    expect(classifyScore(64)).toBe('Substantially modified')
    expect(classifyScore(0)).toBe('Substantially modified')
  })

  it('compareTexts treats trimmed-equal texts as unchanged', () => {
    expect(compareTexts('  same text\n', 'same text')).toEqual({ status: 'Unchanged', similarity: 100 })
    expect(compareTexts(null, undefined)).toEqual({ status: 'Unchanged', similarity: 100 })
  })

  it('compareTexts classifies edits', () => {
    const minor = compareTexts('A fine of 100 shall apply.', 'A fine of 500 shall apply.')
    expect(minor.status).toBe('Minor edit')
    expect(minor.similarity).toBeLessThan(100)
    expect(compareTexts('', 'new words')).toEqual({ status: 'Substantially modified', similarity: 0 })
  })
})
