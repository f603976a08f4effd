import type { CellValue, Table } from './types'

export const DEFAULT_PREVIEW_ROWS = 20

function moreRowsFooter(table: Table, limit: number): string[] {
  const hidden = table.rows.length - limit
  return hidden > 0 ? ['', `... ${hidden} more rows`] : []
}

// ========== Markdown ==========

function markdownCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return ''
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ')
}

export function exportAsMarkdown(table: Table, limit: number = DEFAULT_PREVIEW_ROWS): string {
  const names = table.columns.map(c => c.name)
  const lines = [
    `| ${names.map(markdownCell).join(' | ')} |`,
    `| ${names.map(() => '---').join(' | ')} |`,
    ...table.rows.slice(0, limit).map(row => `| ${names.map(n => markdownCell(row[n])).join(' | ')} |`),
    ...moreRowsFooter(table, limit),
  ]
  return lines.join('\n')
}

// ========== Fixed-width text ==========

function textCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return 'NaN'
  return String(value).replace(/\r?\n/g, ' ')
}

/** Dataframe-style printout: left-aligned row index, right-aligned columns */
export function exportAsText(table: Table, limit: number = DEFAULT_PREVIEW_ROWS): string {
  const names = table.columns.map(c => c.name)
  const rows = table.rows.slice(0, limit)
  const index = rows.map((_, i) => String(i))
  const indexWidth = Math.max(0, ...index.map(i => i.length))

  const cells = rows.map(row => names.map(n => textCell(row[n])))
  const widths = names.map((name, j) => Math.max(name.length, ...cells.map(r => r[j].length)))

  const header = [' '.repeat(indexWidth), ...names.map((n, j) => n.padStart(widths[j]))].join('  ')
  const body = cells.map((r, i) =>
    [index[i].padEnd(indexWidth), ...r.map((v, j) => v.padStart(widths[j]))].join('  ')
  )

  return [header, ...body, ...moreRowsFooter(table, limit)].join('\n')
}
