import type { Capability, DatasetContext } from './types'

export const ANALYST = `You are a financial analysis assistant. You analyze the tabular dataset the user has loaded and create visualizations of it.

Rules:
1. When the user asks for a chart or visualization, decide which chart type fits the request and call the matching tool.
2. Chart types and when to use them:
   - Bar charts: comparing categories (e.g. "revenue by month", "expenses by department")
   - Line charts: trends over time (e.g. "profit growth", "stock price movement")
   - Pie charts: distribution and percentages (e.g. "expense breakdown", "market share")
   - Heatmaps: correlation between numeric variables
3. Use get_data_info when you need column details, missing values or sample rows before answering.
4. If a tool reports that no data is loaded or that the data has no suitable columns, tell the user plainly; do not retry the same tool.
5. After a chart is generated, explain what it shows and which insights can be drawn from it.
6. Be accurate and concise, and give actionable insights.`

function buildCapabilityList(capabilities: Capability[]): string {
  return capabilities.map(c => `- ${c.name}: ${c.description}`).join('\n')
}

export function buildDataContext(context: DatasetContext | null): string {
  if (!context) return 'No dataset is loaded yet.'

  const columns = context.columns
    .map(name => `${name} (${context.types[name]}${context.temporalColumns.includes(name) ? ', date/time' : ''})`)
    .join(', ')

  return `File: ${context.fileName}\nShape: ${context.shape.rows} rows x ${context.shape.columns} columns\nColumns: ${columns}\nSample:\n${JSON.stringify(context.sample, null, 2)}`
}

export function buildAnalystSystem(capabilities: Capability[], context: DatasetContext | null): string {
  return `${ANALYST}\n\nAvailable tools:\n${buildCapabilityList(capabilities)}\n\nLoaded data:\n${buildDataContext(context)}`
}
