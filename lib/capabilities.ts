import { errorMessage } from './errors'
import {
  describeTable, selectBarChart, selectHeatmap, selectLineChart, selectPieChart,
  type Selection,
} from './heuristics'
import type { ArtifactNamer, ChartRenderer } from './charts'
import type { Capability, CapabilityOutcome, CapabilityRegistry, Table } from './types'

export const NO_DATA_MESSAGE = 'No data loaded. Please load a CSV or Excel file first.'

export interface CapabilityDeps {
  renderer: ChartRenderer
  namer: ArtifactNamer
}

interface ChartCapabilityDef {
  name: string
  description: string
  label: string
  select: (table: Table) => Selection
}

const CHART_CAPABILITIES: ChartCapabilityDef[] = [
  {
    name: 'generate_bar_chart',
    description: 'Generate a bar chart to show categorical data with numeric values. Use for comparisons between categories.',
    label: 'Bar chart',
    select: selectBarChart,
  },
  {
    name: 'generate_line_chart',
    description: 'Generate a line chart to show trends over time or continuous data. Use for time series analysis.',
    label: 'Line chart',
    select: selectLineChart,
  },
  {
    name: 'generate_pie_chart',
    description: 'Generate a pie chart to show percentage distribution of categorical data. Use for showing parts of a whole.',
    label: 'Pie chart',
    select: selectPieChart,
  },
  {
    name: 'generate_heatmap',
    description: 'Generate a correlation heatmap to show relationships between numeric variables.',
    label: 'Correlation heatmap',
    select: selectHeatmap,
  },
]

function chartCapability(def: ChartCapabilityDef, deps: CapabilityDeps): Capability {
  return {
    name: def.name,
    description: def.description,
    async invoke(table): Promise<CapabilityOutcome> {
      if (!table) return { text: NO_DATA_MESSAGE }

      const selection = def.select(table)
      if (!selection.ok) return { text: selection.reason }

      try {
        const artifact = await deps.namer.next(selection.spec.kind, deps.renderer.extension)
        await deps.renderer.render(selection.spec, artifact.filePath)
        return { text: `${def.label} generated successfully: ${artifact.fileName}`, artifact }
      } catch (err) {
        console.error(`[CAPABILITY] ${def.name} failed:`, err)
        return { text: `Error generating ${def.label.toLowerCase()}: ${errorMessage(err)}` }
      }
    },
  }
}

const dataInfoCapability: Capability = {
  name: 'get_data_info',
  description: 'Get detailed information about the loaded dataset including columns, data types, missing values and sample data.',
  async invoke(table) {
    return { text: table ? describeTable(table) : NO_DATA_MESSAGE }
  },
}

export function createCapabilityRegistry(deps: CapabilityDeps): CapabilityRegistry {
  const capabilities = [
    ...CHART_CAPABILITIES.map(def => chartCapability(def, deps)),
    dataInfoCapability,
  ]
  return new Map(capabilities.map(c => [c.name, c] as const))
}
