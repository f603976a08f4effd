import fs from 'fs/promises'
import path from 'path'
import { EngineError, errorMessage, isEngineError } from './errors'
import { buildContext, readTable } from './metadata'
import type { DatasetContext, Table } from './types'

export type LoadResult =
  | { ok: true; context: DatasetContext }
  | { ok: false; error: EngineError }

/**
 * Holds the single active table. A load either replaces the table and its
 * context together or leaves both untouched.
 */
export class DatasetHolder {
  private active: { table: Table; context: DatasetContext } | null = null

  constructor(private readonly inputDir: string = process.cwd()) {}

  get table(): Table | null {
    return this.active?.table ?? null
  }

  resolvePath(filePath: string): string {
    return path.resolve(this.inputDir, filePath)
  }

  async load(filePath: string, displayName?: string): Promise<LoadResult> {
    const resolved = this.resolvePath(filePath)

    try {
      await fs.access(resolved)
    } catch {
      return { ok: false, error: new EngineError('NotFound', `File ${filePath} not found`) }
    }

    try {
      const table = await readTable(resolved, displayName)
      const context = buildContext(table)
      this.active = { table, context }
      console.warn(`[DATASET] Loaded ${table.name}: ${context.shape.rows} rows x ${context.shape.columns} columns`)
      return { ok: true, context }
    } catch (err) {
      const error = isEngineError(err)
        ? err
        : new EngineError('ParseError', `Failed to load data from ${filePath}: ${errorMessage(err)}`, { cause: err })
      console.warn(`[DATASET] Load failed (${error.code}): ${error.message}`)
      return { ok: false, error }
    }
  }

  summary(): DatasetContext | null {
    return this.active?.context ?? null
  }
}
