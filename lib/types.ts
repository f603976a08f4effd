// ========== Table ==========

export type CellValue = number | string | boolean | null
export type Row = Record<string, CellValue>

export type ColumnType = 'numeric' | 'categorical' | 'boolean'

export interface ColumnInfo {
  name: string
  type: ColumnType
  // true when the column name looks like a date/time field
  temporal: boolean
  missing: number
  unique: number
}

export interface Table {
  name: string
  sourcePath: string
  columns: ColumnInfo[]
  rows: Row[]
}

export interface DatasetContext {
  fileName: string
  sourcePath: string
  columns: string[]
  shape: { rows: number; columns: number }
  types: Record<string, ColumnType>
  temporalColumns: string[]
  sample: Row[]
}

// ========== Conversation ==========

export interface Turn {
  role: 'user' | 'assistant'
  content: string
}

// ========== Charts ==========

export type ChartKind = 'bar' | 'line' | 'pie' | 'heatmap'

export type ChartSpec =
  | { kind: 'bar'; title: string; xLabel: string; yLabel: string; categories: string[]; values: number[] }
  | { kind: 'line'; title: string; xLabel: string; yLabel: string; points: Array<{ x: string; y: number }> }
  | { kind: 'pie'; title: string; column: string; labels: string[]; counts: number[] }
  | { kind: 'heatmap'; title: string; columns: string[]; matrix: Array<Array<number | null>> }

export interface Artifact {
  kind: ChartKind
  fileName: string
  filePath: string
  createdAt: string
}

// ========== Capabilities ==========

export interface CapabilityOutcome {
  text: string
  artifact?: Artifact
}

export interface Capability {
  name: string
  description: string
  invoke(table: Table | null): Promise<CapabilityOutcome>
}

export type CapabilityRegistry = ReadonlyMap<string, Capability>

// ========== Reasoning service ==========

export interface OutputFragment {
  type: string
  text?: string
}

export type AgentOutput =
  | { kind: 'text'; text: string }
  | { kind: 'fragments'; fragments: OutputFragment[] }
  | { kind: 'object'; value: Record<string, unknown> }

export interface ScratchStep {
  callId: string
  capability: string
  input: Record<string, unknown>
  preamble: string
  result: string
}

export interface DecisionInput {
  system: string
  history: Turn[]
  message: string
  scratch: ScratchStep[]
  capabilities: Capability[]
}

export type Decision =
  | { kind: 'final'; output: AgentOutput }
  | { kind: 'invoke'; callId: string; capability: string; input: Record<string, unknown>; preamble: string }

export interface ReasoningService {
  decide(input: DecisionInput): Promise<Decision>
}

// ========== Agent Loop ==========

export interface AgentResult {
  answer: string
  output: AgentOutput | null
  artifacts: Artifact[]
  steps: ScratchStep[]
  forced: boolean
}

export type AgentEvent =
  | { type: 'decision'; data: { step: number; decision: Decision['kind'] } }
  | { type: 'capability_start'; data: { step: number; capability: string } }
  | { type: 'capability_complete'; data: { step: number; capability: string; result: string; artifact?: Artifact } }
  | { type: 'final'; data: { answer: string; steps: number } }
  | { type: 'forced'; data: { answer: string; steps: number } }

// ========== Bridge ==========

export interface FileData {
  path: string
  name?: string
  type?: string
  size?: number
}

export interface BridgeRequest {
  id: string
  type: string
  message?: string
  fileData?: FileData
  parameters?: Record<string, string>
  sessionId?: string
}

export interface BridgeResponse {
  id: string
  status: 'success' | 'error'
  message: string
  tableData?: string
  data?: string
  charts?: string[]
  error?: string
}
