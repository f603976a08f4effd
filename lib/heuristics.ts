import { isMissing } from './metadata'
import type { CellValue, ChartSpec, ColumnInfo, Table } from './types'

export type Selection<T extends ChartSpec = ChartSpec> =
  | { ok: true; spec: T }
  | { ok: false; reason: string }

type Spec<K extends ChartSpec['kind']> = Extract<ChartSpec, { kind: K }>

// ========== Column roles ==========

export function numericColumns(table: Table): ColumnInfo[] {
  return table.columns.filter(c => c.type === 'numeric')
}

export function categoricalColumns(table: Table): ColumnInfo[] {
  return table.columns.filter(c => c.type === 'categorical')
}

export function temporalColumns(table: Table): ColumnInfo[] {
  return table.columns.filter(c => c.temporal)
}

function asNumber(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// ========== Bar: sum of first numeric per first categorical ==========

export function selectBarChart(table: Table): Selection<Spec<'bar'>> {
  const x = categoricalColumns(table)[0]
  const y = numericColumns(table)[0]
  if (!x || !y) {
    return { ok: false, reason: "Data doesn't have suitable columns for bar chart" }
  }

  const sums = new Map<string, number>()
  for (const row of table.rows) {
    const key = row[x.name]
    if (isMissing(key)) continue
    const label = String(key)
    sums.set(label, (sums.get(label) ?? 0) + (asNumber(row[y.name]) ?? 0))
  }

  const groups = [...sums.entries()]
    .sort((a, b) => compareKeys(a[0], b[0]))
    .sort((a, b) => b[1] - a[1])

  return {
    ok: true,
    spec: {
      kind: 'bar',
      title: `${y.name} by ${x.name}`,
      xLabel: x.name,
      yLabel: y.name,
      categories: groups.map(([label]) => label),
      values: groups.map(([, value]) => value),
    },
  }
}

// ========== Line: first numeric over first date/time-named column ==========

export function toTimestamp(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string') {
    const parsed = Date.parse(value)
    return Number.isNaN(parsed) ? null : parsed
  }
  return null
}

export function selectLineChart(table: Table): Selection<Spec<'line'>> {
  const x = temporalColumns(table)[0]
  const y = numericColumns(table)[0]
  if (!x || !y) {
    return { ok: false, reason: "Data doesn't have suitable date and numeric columns for line chart" }
  }

  const points: Array<{ t: number; y: number }> = []
  for (const row of table.rows) {
    const raw = row[x.name]
    const value = asNumber(row[y.name])
    if (isMissing(raw) || value === null) continue
    const t = toTimestamp(raw)
    if (t === null) {
      return { ok: false, reason: `Column '${x.name}' contains values that are not dates` }
    }
    points.push({ t, y: value })
  }

  points.sort((a, b) => a.t - b.t)

  return {
    ok: true,
    spec: {
      kind: 'line',
      title: `${y.name} Over Time`,
      xLabel: x.name,
      yLabel: y.name,
      points: points.map(p => ({ x: new Date(p.t).toISOString(), y: p.y })),
    },
  }
}

// ========== Pie: value counts of first categorical ==========

export function selectPieChart(table: Table): Selection<Spec<'pie'>> {
  const col = categoricalColumns(table)[0]
  if (!col) {
    return { ok: false, reason: "Data doesn't have categorical columns for pie chart" }
  }

  // Map keeps first-appearance order, sort is stable
  const counts = new Map<string, number>()
  for (const row of table.rows) {
    const value = row[col.name]
    if (isMissing(value)) continue
    const label = String(value)
    counts.set(label, (counts.get(label) ?? 0) + 1)
  }
  const entries = [...counts.entries()].sort((a, b) => b[1] - a[1])

  return {
    ok: true,
    spec: {
      kind: 'pie',
      title: `Distribution of ${col.name}`,
      column: col.name,
      labels: entries.map(([label]) => label),
      counts: entries.map(([, count]) => count),
    },
  }
}

// ========== Heatmap: pairwise Pearson correlation ==========

export function pearson(xs: Array<number | null>, ys: Array<number | null>): number | null {
  const pairs: Array<[number, number]> = []
  for (let i = 0; i < Math.min(xs.length, ys.length); i++) {
    const a = xs[i]
    const b = ys[i]
    if (a !== null && b !== null) pairs.push([a, b])
  }
  if (pairs.length < 2) return null

  const meanX = pairs.reduce((s, [a]) => s + a, 0) / pairs.length
  const meanY = pairs.reduce((s, [, b]) => s + b, 0) / pairs.length
  let cov = 0
  let varX = 0
  let varY = 0
  for (const [a, b] of pairs) {
    cov += (a - meanX) * (b - meanY)
    varX += (a - meanX) ** 2
    varY += (b - meanY) ** 2
  }
  if (varX === 0 || varY === 0) return null

  return Math.max(-1, Math.min(1, cov / Math.sqrt(varX * varY)))
}

export function correlationMatrix(table: Table, columns: ColumnInfo[]): Array<Array<number | null>> {
  const series = columns.map(c => table.rows.map(r => asNumber(r[c.name])))
  return series.map(xs => series.map(ys => pearson(xs, ys)))
}

export function selectHeatmap(table: Table): Selection<Spec<'heatmap'>> {
  const cols = numericColumns(table)
  if (cols.length < 2) {
    return { ok: false, reason: 'Need at least 2 numeric columns for correlation heatmap' }
  }

  return {
    ok: true,
    spec: {
      kind: 'heatmap',
      title: 'Correlation Heatmap',
      columns: cols.map(c => c.name),
      matrix: correlationMatrix(table, cols),
    },
  }
}

// ========== Info ==========

export function describeTable(table: Table): string {
  const info = {
    shape: [table.rows.length, table.columns.length],
    columns: table.columns.map(c => c.name),
    numeric_columns: numericColumns(table).map(c => c.name),
    categorical_columns: categoricalColumns(table).map(c => c.name),
    boolean_columns: table.columns.filter(c => c.type === 'boolean').map(c => c.name),
    temporal_columns: temporalColumns(table).map(c => c.name),
    missing_values: Object.fromEntries(table.columns.map(c => [c.name, c.missing])),
    sample_data: table.rows.slice(0, 3),
  }
  return `Data Information:\n${JSON.stringify(info, null, 2)}`
}
