import fs from 'fs/promises'
import path from 'path'
import Papa from 'papaparse'
import * as XLSX from 'xlsx'
import { EngineError, errorMessage } from './errors'
import type { CellValue, ColumnInfo, ColumnType, DatasetContext, Row, Table } from './types'

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls']
export const SAMPLE_SIZE = 3

const MISSING_TOKENS = new Set(['', 'na', 'n/a', 'nan', 'null', 'none', '#n/a'])
const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const TEMPORAL_NAME = /date|time/i

// ========== Value normalization ==========

/** Normalizes a raw text cell: missing markers become null, numeric and boolean literals are converted */
export function normalizeValue(raw: string): CellValue {
  const trimmed = raw.trim()
  const lower = trimmed.toLowerCase()

  if (MISSING_TOKENS.has(lower)) return null
  if (lower === 'true') return true
  if (lower === 'false') return false
  if (NUMERIC_PATTERN.test(trimmed)) return Number(trimmed)

  return trimmed
}

function normalizeCell(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw === 'boolean') return raw
  if (raw instanceof Date) return raw.toISOString()
  return normalizeValue(String(raw))
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined
}

// ========== Column analysis ==========

export function inferType(values: CellValue[]): ColumnType {
  // no rows at all: nothing says the column is numeric
  if (values.length === 0) return 'categorical'
  const present = values.filter(v => !isMissing(v))
  if (present.every(v => typeof v === 'number')) return 'numeric'
  if (present.every(v => typeof v === 'boolean')) return 'boolean'
  return 'categorical'
}

export function isTemporalName(name: string): boolean {
  return TEMPORAL_NAME.test(name)
}

function uniqueHeaders(raw: CellValue[]): string[] {
  const seen = new Map<string, number>()
  return raw.map((cell, i) => {
    const base = isMissing(cell) || String(cell).trim() === '' ? `Unnamed: ${i}` : String(cell).trim()
    const count = seen.get(base) ?? 0
    seen.set(base, count + 1)
    return count > 0 ? `${base}_${count + 1}` : base
  })
}

export function buildTable(name: string, sourcePath: string, grid: CellValue[][]): Table {
  if (grid.length === 0 || grid[0].length === 0) {
    throw new EngineError('ParseError', 'No columns to parse from file')
  }

  const headers = uniqueHeaders(grid[0])
  const rows: Row[] = []

  grid.slice(1).forEach((cells, i) => {
    if (cells.length > headers.length) {
      throw new EngineError(
        'ParseError',
        `Expected ${headers.length} fields in line ${i + 2}, saw ${cells.length}`,
      )
    }
    const row: Row = {}
    headers.forEach((h, j) => {
      row[h] = j < cells.length ? cells[j] : null
    })
    rows.push(row)
  })

  const columns: ColumnInfo[] = headers.map(header => {
    const values = rows.map(r => r[header])
    const present = values.filter(v => !isMissing(v))
    return {
      name: header,
      type: inferType(values),
      temporal: isTemporalName(header),
      missing: values.length - present.length,
      unique: new Set(present).size,
    }
  })

  return { name, sourcePath, columns, rows }
}

export function buildContext(table: Table): DatasetContext {
  return {
    fileName: table.name,
    sourcePath: table.sourcePath,
    columns: table.columns.map(c => c.name),
    shape: { rows: table.rows.length, columns: table.columns.length },
    types: Object.fromEntries(table.columns.map(c => [c.name, c.type])),
    temporalColumns: table.columns.filter(c => c.temporal).map(c => c.name),
    sample: table.rows.slice(0, SAMPLE_SIZE).map(r => ({ ...r })),
  }
}

// ========== File readers ==========

export function parseCsv(content: string): CellValue[][] {
  // BOM
  const text = content.charCodeAt(0) === 0xFEFF ? content.slice(1) : content
  const result = Papa.parse<string[]>(text, { skipEmptyLines: 'greedy' })

  const quoteError = result.errors.find(e => e.type === 'Quotes')
  if (quoteError) {
    throw new EngineError('ParseError', `${quoteError.message} (row ${quoteError.row ?? '?'})`)
  }

  return result.data.map(cells => cells.map(normalizeValue))
}

export function parseWorkbook(buffer: Buffer): CellValue[][] {
  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' })
  } catch (err) {
    throw new EngineError('ParseError', `Unreadable workbook: ${errorMessage(err)}`, { cause: err })
  }

  const sheetName = workbook.SheetNames[0]
  if (!sheetName) throw new EngineError('ParseError', 'Workbook has no sheets')

  const grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  })
  return grid.map(cells => cells.map(normalizeCell))
}

export async function readTable(filePath: string, displayName?: string): Promise<Table> {
  const ext = path.extname(filePath).toLowerCase()
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    throw new EngineError(
      'UnsupportedFormat',
      `Unsupported file format '${ext || '(none)'}'. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    )
  }

  const name = displayName ?? path.basename(filePath)
  if (ext === '.csv') {
    const content = await fs.readFile(filePath, 'utf-8')
    return buildTable(name, filePath, parseCsv(content))
  }

  const buffer = await fs.readFile(filePath)
  return buildTable(name, filePath, parseWorkbook(buffer))
}
