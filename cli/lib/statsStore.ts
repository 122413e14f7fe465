import * as fs from 'fs'
import * as path from 'path'
import type { Activity, Stat, StatsRepository, StorageData } from '../../src/types'
import { decodeStorage, emptyStorageData, encodeStorage, StatsStoreError } from './statsCodec'

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Stats history backed by one binary file. The in-memory copy is the only
 * source of truth while the process runs; every flush rewrites the whole file.
 */
export class StatsStore implements StatsRepository {
  private data: StorageData = emptyStorageData()

  constructor(private readonly filePath: string) {}

  /**
   * Loads the file, or seeds an empty history and writes it. A file that
   * exists but cannot be used is copied to `<file>.corrupt` before seeding.
   */
  init(): this {
    try {
      this.data = this.load()
      return this
    } catch (err) {
      if (err instanceof StatsStoreError && err.kind === 'missing') {
        console.log(`No stats file at ${this.filePath}, starting a new history`)
      } else {
        const backupPath = this.backupUnusableFile()
        console.warn(
          `Stats file ${this.filePath} could not be used, starting a new history` +
            (backupPath ? ` (previous file kept at ${backupPath})` : ''),
          err
        )
      }
    }

    this.data = emptyStorageData()
    this.flush()
    return this
  }

  /** Reads the file again without touching the in-memory history. */
  load(): StorageData {
    let bytes: Uint8Array
    try {
      bytes = fs.readFileSync(this.filePath)
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new StatsStoreError('missing', `Stats file not found: ${this.filePath}`, { cause: err })
      }
      throw new StatsStoreError('unreadable', `Could not read stats file: ${this.filePath}`, {
        cause: err,
      })
    }
    return decodeStorage(bytes)
  }

  flush(): void {
    const tmpPath = `${this.filePath}.tmp`
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
      fs.writeFileSync(tmpPath, encodeStorage(this.data))
      fs.renameSync(tmpPath, this.filePath)
    } catch (err) {
      this.removeTempFile(tmpPath)
      throw new StatsStoreError('write-failed', `Could not write stats file: ${this.filePath}`, {
        cause: err,
      })
    }
  }

  insert(stat: Stat, activity?: Activity): boolean {
    this.data.stats.push(stat)
    if (activity) {
      this.data.activities.push(activity)
    }

    try {
      this.flush()
      return true
    } catch (err) {
      console.error('Failed to save stats:', err)
      return false
    }
  }

  getStats(): readonly Stat[] {
    return this.data.stats
  }

  getReversed(): Stat[] {
    return [...this.data.stats].reverse()
  }

  getActivities(): readonly Activity[] {
    return this.data.activities
  }

  private removeTempFile(tmpPath: string): void {
    if (!fs.existsSync(tmpPath)) return
    try {
      fs.rmSync(tmpPath, { force: true })
    } catch (err) {
      console.warn(`Could not remove ${tmpPath}:`, err)
    }
  }

  private backupUnusableFile(): string | null {
    const backupPath = `${this.filePath}.corrupt`
    try {
      fs.copyFileSync(this.filePath, backupPath)
      return backupPath
    } catch (err) {
      console.warn(`Could not back up ${this.filePath}:`, err)
      return null
    }
  }
}
