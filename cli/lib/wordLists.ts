import * as fs from 'fs'
import { fileURLToPath } from 'url'
import type { LanguageName } from '../../src/types'

const cache = new Map<LanguageName, readonly string[]>()

export function wordListPath(language: LanguageName): string {
  return fileURLToPath(new URL(`../../data/languages/${language}.json`, import.meta.url))
}

function isWordList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((word) => typeof word === 'string' && word.length > 0 && !/\s/.test(word))
  )
}

export function parseWordList(raw: string, source: string): readonly string[] {
  const parsed: unknown = JSON.parse(raw)
  if (!isWordList(parsed)) {
    throw new Error(`Word list ${source} must be a non-empty array of single words`)
  }
  return Object.freeze([...parsed])
}

/** Loads the bundled words for a language once per process. */
export function loadWordList(language: LanguageName): readonly string[] {
  const cached = cache.get(language)
  if (cached) return cached

  const filePath = wordListPath(language)
  const words = parseWordList(fs.readFileSync(filePath, 'utf-8'), filePath)
  cache.set(language, words)
  return words
}
