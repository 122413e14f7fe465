import { describe, expect, it } from 'vitest'
import { LANGUAGE_NAMES } from '../../src/types'
import { loadWordList, parseWordList } from './wordLists'

describe('wordLists', () => {
  it('ships a word list for every language', () => {
    for (const language of LANGUAGE_NAMES) {
      const words = loadWordList(language)
      expect(words.length).toBeGreaterThan(50)
      expect(words.every((word) => word === word.trim() && word.length > 0)).toBe(true)
    }
  })

  it('returns the cached list on repeated loads', () => {
    expect(loadWordList('english')).toBe(loadWordList('english'))
  })

  it('parses a valid list into a frozen copy', () => {
    const words = parseWordList('["alpha", "beta"]', 'test.json')
    expect(words).toEqual(['alpha', 'beta'])
    expect(Object.isFrozen(words)).toBe(true)
  })

  it('rejects malformed lists', () => {
    expect(() => parseWordList('[]', 'empty.json')).toThrow(
      'Word list empty.json must be a non-empty array of single words'
    )
    expect(() => parseWordList('{"words": []}', 'object.json')).toThrow('object.json')
    expect(() => parseWordList('["two words"]', 'phrase.json')).toThrow('phrase.json')
    expect(() => parseWordList('[1, 2]', 'numbers.json')).toThrow('numbers.json')
  })
})
