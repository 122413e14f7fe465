import { decode, encode } from '@msgpack/msgpack'
import { isTypingDuration } from '../../src/lib/typingDuration'
import type {
  Activity,
  SessionOutcome,
  Stat,
  StorageData,
  StorageEntry,
  StorageKey,
} from '../../src/types'

export const STATS_SCHEMA_VERSION = 1

export type StatsStoreErrorKind =
  | 'missing'
  | 'unreadable'
  | 'corrupt'
  | 'unsupported-version'
  | 'write-failed'

export class StatsStoreError extends Error {
  readonly kind: StatsStoreErrorKind

  constructor(kind: StatsStoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StatsStoreError'
    this.kind = kind
  }
}

interface StatsDocument {
  schemaVersion: number
  entries: StorageEntry[]
}

const STORAGE_KEYS: readonly StorageKey[] = ['stats', 'activities']

export function emptyStorageData(): StorageData {
  return { stats: [], activities: [] }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled storage entry: ${JSON.stringify(value)}`)
}

function toEntry(key: StorageKey, data: StorageData): StorageEntry {
  switch (key) {
    case 'stats':
      return { key, value: [...data.stats] }
    case 'activities':
      return { key, value: [...data.activities] }
    default:
      return assertNever(key)
  }
}

export function encodeStorage(data: StorageData): Uint8Array {
  const document: StatsDocument = {
    schemaVersion: STATS_SCHEMA_VERSION,
    entries: STORAGE_KEYS.map((key) => toEntry(key, data)),
  }
  return encode(document)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSessionOutcome(value: unknown): value is SessionOutcome {
  return value === 'completed' || value === 'timed-out'
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function parseStat(value: unknown): Stat {
  if (
    !isRecord(value) ||
    !isTypingDuration(value.duration) ||
    !isFiniteNumber(value.averageWpm) ||
    !isFiniteNumber(value.errorCount) ||
    !isFiniteNumber(value.elapsedSecs) ||
    !isFiniteNumber(value.accuracy) ||
    !isSessionOutcome(value.outcome) ||
    !isFiniteNumber(value.finishedAt)
  ) {
    throw new StatsStoreError('corrupt', 'Invalid stat record')
  }

  return Object.freeze({
    duration: value.duration,
    averageWpm: value.averageWpm,
    errorCount: value.errorCount,
    elapsedSecs: value.elapsedSecs,
    accuracy: value.accuracy,
    outcome: value.outcome,
    finishedAt: value.finishedAt,
  })
}

function parseActivity(value: unknown): Activity {
  if (
    !isRecord(value) ||
    !isTypingDuration(value.duration) ||
    !isSessionOutcome(value.outcome) ||
    !isFiniteNumber(value.startedAt) ||
    !isFiniteNumber(value.finishedAt)
  ) {
    throw new StatsStoreError('corrupt', 'Invalid activity record')
  }

  return Object.freeze({
    duration: value.duration,
    outcome: value.outcome,
    startedAt: value.startedAt,
    finishedAt: value.finishedAt,
  })
}

function parseList<T>(value: unknown, parseItem: (item: unknown) => T): T[] {
  if (!Array.isArray(value)) {
    throw new StatsStoreError('corrupt', 'Storage entry value must be a list')
  }
  return value.map(parseItem)
}

function parseEntry(value: unknown): StorageEntry {
  if (!isRecord(value)) {
    throw new StatsStoreError('corrupt', 'Invalid storage entry')
  }

  switch (value.key) {
    case 'stats':
      return { key: 'stats', value: parseList(value.value, parseStat) }
    case 'activities':
      return { key: 'activities', value: parseList(value.value, parseActivity) }
    default:
      throw new StatsStoreError('corrupt', `Unknown storage key: ${String(value.key)}`)
  }
}

/**
 * Decodes and validates a stats file. Every record is checked and both keys
 * must appear exactly once.
 */
export function decodeStorage(bytes: Uint8Array): StorageData {
  let raw: unknown
  try {
    raw = decode(bytes)
  } catch (err) {
    throw new StatsStoreError('corrupt', 'Stats file is not valid MessagePack', { cause: err })
  }

  if (!isRecord(raw) || !isFiniteNumber(raw.schemaVersion)) {
    throw new StatsStoreError('corrupt', 'Stats file has no schema version')
  }
  if (raw.schemaVersion !== STATS_SCHEMA_VERSION) {
    throw new StatsStoreError(
      'unsupported-version',
      `Unsupported stats schema version: ${raw.schemaVersion}`
    )
  }
  if (!Array.isArray(raw.entries)) {
    throw new StatsStoreError('corrupt', 'Stats file has no entries')
  }

  const data = emptyStorageData()
  const seen = new Set<StorageKey>()
  for (const item of raw.entries) {
    const entry = parseEntry(item)
    if (seen.has(entry.key)) {
      throw new StatsStoreError('corrupt', `Duplicate storage key: ${entry.key}`)
    }
    seen.add(entry.key)

    switch (entry.key) {
      case 'stats':
        data.stats = entry.value
        break
      case 'activities':
        data.activities = entry.value
        break
      default:
        assertNever(entry)
    }
  }

  for (const key of STORAGE_KEYS) {
    if (!seen.has(key)) {
      throw new StatsStoreError('corrupt', `Missing storage key: ${key}`)
    }
  }

  return data
}
