import { describe, it, expect } from 'vitest'
import * as XLSX from 'xlsx'
import {
  buildContext, buildTable, inferType, normalizeValue, parseCsv, parseWorkbook, readTable,
} from '@/lib/metadata'
import { EngineError } from '@/lib/errors'
import { SAMPLE_CSV } from '../fakes'

describe('normalizeValue', () => {
  it('should convert numeric literals', () => {
    expect(normalizeValue(' 12.5 ')).toBe(12.5)
    expect(normalizeValue('-3')).toBe(-3)
    expect(normalizeValue('1e3')).toBe(1000)
  })

  it('should treat missing markers as null', () => {
    for (const token of ['', '  ', 'NA', 'n/a', 'NaN', 'null', 'None', '#N/A']) {
      expect(normalizeValue(token)).toBeNull()
    }
  })

  it('should convert boolean literals case-insensitively', () => {
    expect(normalizeValue('TRUE')).toBe(true)
    expect(normalizeValue('false')).toBe(false)
  })

  it('should keep other text trimmed', () => {
    expect(normalizeValue('  North ')).toBe('North')
    expect(normalizeValue('1,200')).toBe('1,200')
  })
})

describe('inferType', () => {
  it('should ignore missing values', () => {
    expect(inferType([1, null, 2.5])).toBe('numeric')
    expect(inferType([true, null, false])).toBe('boolean')
    expect(inferType([1, 'x'])).toBe('categorical')
  })

  it('should treat an all-missing column as numeric', () => {
    expect(inferType([null, null])).toBe('numeric')
  })

  it('should treat a column without rows as categorical', () => {
    expect(inferType([])).toBe('categorical')
  })
})

describe('buildTable', () => {
  it('should name blank headers and de-duplicate repeated ones', () => {
    const table = buildTable('t.csv', 't.csv', [['a', 'a', null], [1, 2, 3]])
    expect(table.columns.map(c => c.name)).toEqual(['a', 'a_2', 'Unnamed: 2'])
    expect(table.rows[0]).toEqual({ a: 1, a_2: 2, 'Unnamed: 2': 3 })
  })

  it('should pad short rows with null', () => {
    const table = buildTable('t.csv', 't.csv', [['a', 'b'], [1]])
    expect(table.rows).toEqual([{ a: 1, b: null }])
    expect(table.columns[1]).toMatchObject({ name: 'b', missing: 1, unique: 0 })
  })

  it('should reject rows wider than the header', () => {
    expect(() => buildTable('t.csv', 't.csv', [['a', 'b'], [1, 2, 3]]))
      .toThrow('Expected 2 fields in line 2, saw 3')
  })

  it('should type the columns of a header-only file as categorical', () => {
    const table = buildTable('h.csv', 'h.csv', parseCsv('Revenue,Expenses\n'))
    expect(table.rows).toEqual([])
    expect(table.columns.map(c => c.type)).toEqual(['categorical', 'categorical'])
  })

  it('should reject an empty grid', () => {
    expect(() => buildTable('t.csv', 't.csv', [])).toThrow('No columns to parse from file')
  })
})

describe('parseCsv', () => {
  it('should strip a byte order mark and skip blank lines', () => {
    expect(parseCsv('\uFEFFa,b\n1,x\n\n')).toEqual([['a', 'b'], [1, 'x']])
  })

  it('should raise a parse error on an unterminated quote', () => {
    expect(() => parseCsv('a,b\n"open,1\n')).toThrow(EngineError)
  })
})

describe('parseWorkbook', () => {
  it('should read the first sheet with typed cells', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Name', 'Score', 'Passed'], ['Ana', 9.5, true], ['Bo', null, false]])
    const workbook = XLSX.utils.book_new()
    XLSX.utils.book_append_sheet(workbook, sheet, 'Scores')
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })

    expect(parseWorkbook(buffer)).toEqual([
      ['Name', 'Score', 'Passed'],
      ['Ana', 9.5, true],
      ['Bo', null, false],
    ])
  })
})

describe('readTable', () => {
  it('should load the sample CSV with inferred column types', async () => {
    const table = await readTable(SAMPLE_CSV)
    expect(table.name).toBe('sample.csv')
    expect(table.rows).toHaveLength(6)
    expect(table.columns.map(c => [c.name, c.type])).toEqual([
      ['Month', 'categorical'],
      ['Region', 'categorical'],
      ['Date', 'categorical'],
      ['Revenue', 'numeric'],
      ['Expenses', 'numeric'],
    ])
    expect(table.columns.find(c => c.name === 'Revenue')?.missing).toBe(1)
  })

  it('should reject unsupported extensions', async () => {
    await expect(readTable('/tmp/notes.txt')).rejects.toMatchObject({ code: 'UnsupportedFormat' })
  })
})

describe('buildContext', () => {
  it('should summarize shape, types and a three-row sample', async () => {
    const context = buildContext(await readTable(SAMPLE_CSV, 'Q1 sales'))
    expect(context.fileName).toBe('Q1 sales')
    expect(context.shape).toEqual({ rows: 6, columns: 5 })
    expect(context.types.Expenses).toBe('numeric')
    expect(context.temporalColumns).toEqual(['Date'])
    expect(context.sample).toHaveLength(3)
    expect(context.sample[0]).toEqual({ Month: 'Jan', Region: 'North', Date: '2024-01-31', Revenue: 1200, Expenses: 800 })
  })
})
