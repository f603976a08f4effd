import fs from 'fs/promises'
import path from 'path'
import { v4 as uuid } from 'uuid'
import { z } from 'zod'
import type { AnalysisEngine } from './engine'
import { EngineError, errorMessage, isEngineError } from './errors'
import { DEFAULT_PREVIEW_ROWS, exportAsMarkdown, exportAsText } from './export'
import type { AgentEvent, BridgeRequest, BridgeResponse } from './types'

export const UNKNOWN_ID = 'unknown'

export const TABLE_TRIGGER_WORDS = [
  'table', 'tabela', 'report', 'relatório', 'relatorio',
  'compare', 'comparar', 'list', 'listar', 'breakdown',
]

export const COMMANDS = ['init', 'load', 'chat', 'summary', 'history', 'clear'] as const
export type Command = typeof COMMANDS[number]

export interface CommandOptions {
  file?: string
  message?: string
  apiKey?: string
  sessionId?: string
}

// ========== Request parsing ==========

const FileDataSchema = z.object({
  path: z.string().min(1),
  name: z.string().optional(),
  type: z.string().optional(),
  size: z.number().optional(),
})

const RequestSchema = z.object({
  id: z.string(),
  type: z.string(),
  message: z.string().nullish(),
  fileData: FileDataSchema.nullish(),
  parameters: z.record(z.string()).nullish(),
  sessionId: z.string().nullish(),
}).transform((r): BridgeRequest => ({
  id: r.id,
  type: r.type,
  message: r.message ?? undefined,
  fileData: r.fileData ?? undefined,
  parameters: r.parameters ?? undefined,
  sessionId: r.sessionId ?? undefined,
}))

export type ParsedRequest =
  | { ok: true; request: BridgeRequest }
  | { ok: false; id: string; error: EngineError }

function recoverId(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    if (typeof body.id === 'string') return body.id
    if (typeof body.id === 'number' && Number.isFinite(body.id)) return String(body.id)
  }
  return UNKNOWN_ID
}

export function parseRequest(raw: string): ParsedRequest {
  let body: unknown
  try {
    body = JSON.parse(raw)
  } catch (err) {
    return {
      ok: false,
      id: UNKNOWN_ID,
      error: new EngineError('MalformedRequest', `Request is not valid JSON: ${errorMessage(err)}`),
    }
  }

  const parsed = RequestSchema.safeParse(body)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    return { ok: false, id: recoverId(body), error: new EngineError('MalformedRequest', `Invalid request: ${detail}`) }
  }
  return { ok: true, request: parsed.data }
}

// ========== Responses ==========

export function errorResponse(id: string, err: unknown): BridgeResponse {
  if (isEngineError(err)) {
    return { id, status: 'error', message: err.message, error: err.code }
  }
  return { id, status: 'error', message: `Bridge communication error: ${errorMessage(err)}`, error: 'InternalError' }
}

export function wantsTable(message: string): boolean {
  const lower = message.toLowerCase()
  return TABLE_TRIGGER_WORDS.some(word => lower.includes(word))
}

function logAgentEvent(event: AgentEvent): void {
  switch (event.type) {
    case 'capability_start':
      console.warn(`[AGENT] step ${event.data.step}: invoking ${event.data.capability}`)
      break
    case 'capability_complete':
      console.warn(`[AGENT] step ${event.data.step}: ${event.data.result.slice(0, 120)}`)
      break
    case 'forced':
      console.warn(`[AGENT] iteration limit reached after ${event.data.steps} steps`)
      break
    case 'final':
      console.warn(`[AGENT] final answer after ${event.data.steps} steps`)
      break
    default:
      break
  }
}

async function loadResponse(
  engine: AnalysisEngine,
  id: string,
  filePath: string,
  name: string | undefined,
  previewRows: number,
): Promise<BridgeResponse> {
  const displayName = name || path.basename(filePath)
  const result = await engine.loadData(filePath, displayName)
  if (!result.ok) return errorResponse(id, result.error)

  const table = engine.table
  const { rows, columns } = result.context.shape
  return {
    id,
    status: 'success',
    message: `Successfully loaded ${displayName} with ${rows} rows and ${columns} columns`,
    tableData: table ? exportAsMarkdown(table, previewRows) : undefined,
    data: table ? exportAsText(table, previewRows) : undefined,
  }
}

async function chatResponse(
  engine: AnalysisEngine,
  id: string,
  message: string,
  sessionId: string | undefined,
  previewRows: number,
): Promise<BridgeResponse> {
  if (!engine.initialized) engine.init()

  const result = await engine.chat(message, { sessionId, onEvent: logAgentEvent })
  const response: BridgeResponse = {
    id,
    status: 'success',
    message: result.answer,
    charts: result.charts,
  }

  const table = engine.table
  if (table && wantsTable(message)) {
    response.tableData = exportAsMarkdown(table, previewRows)
  }
  return response
}

// ========== Dispatch ==========

export async function handleRequest(
  engine: AnalysisEngine,
  request: BridgeRequest,
  previewRows: number = DEFAULT_PREVIEW_ROWS,
): Promise<BridgeResponse> {
  switch (request.type) {
    case 'load_data': {
      if (!request.fileData?.path) {
        throw new EngineError('MalformedRequest', 'fileData.path is required for load_data requests')
      }
      return loadResponse(engine, request.id, request.fileData.path, request.fileData.name, previewRows)
    }
    case 'chat': {
      if (!request.message?.trim()) {
        throw new EngineError('MalformedRequest', 'message is required for chat requests')
      }
      return chatResponse(engine, request.id, request.message, request.sessionId, previewRows)
    }
    default:
      throw new EngineError('UnknownRequestType', `Unknown request type: ${request.type}`)
  }
}

/** Parses and dispatches one raw request; never throws */
export async function dispatch(engine: AnalysisEngine, raw: string): Promise<BridgeResponse> {
  const parsed = parseRequest(raw)
  if (!parsed.ok) {
    console.error(`[BRIDGE] ${parsed.error.message}`)
    return errorResponse(parsed.id, parsed.error)
  }

  const { request } = parsed
  try {
    return await handleRequest(engine, request)
  } catch (err) {
    console.error(`[BRIDGE] ${request.type} request ${request.id} failed:`, err)
    return errorResponse(request.id, err)
  }
}

export async function writeResponse(responsePath: string, response: BridgeResponse): Promise<void> {
  await fs.mkdir(path.dirname(responsePath), { recursive: true })
  await fs.writeFile(responsePath, JSON.stringify(response, null, 2), 'utf-8')
}

export async function processRequestFile(
  engine: AnalysisEngine,
  requestPath: string,
  responsePath: string,
): Promise<BridgeResponse> {
  let raw: string
  let response: BridgeResponse
  try {
    raw = await fs.readFile(requestPath, 'utf-8')
    response = await dispatch(engine, raw)
  } catch (err) {
    console.error(`[BRIDGE] Could not read request ${requestPath}:`, err)
    response = errorResponse(UNKNOWN_ID, new EngineError('NotFound', `Request file ${requestPath} could not be read`, { cause: err }))
  }

  await writeResponse(responsePath, response)
  return response
}

// ========== Discrete commands ==========

export function isCommand(value: string): value is Command {
  const names: readonly string[] = COMMANDS
  return names.includes(value)
}

export async function runCommand(
  engine: AnalysisEngine,
  command: Command,
  options: CommandOptions = {},
): Promise<BridgeResponse> {
  const id = uuid()

  try {
    switch (command) {
      case 'init':
        engine.init(options.apiKey)
        return { id, status: 'success', message: 'Agent initialized successfully' }

      case 'load':
        if (!options.file) {
          throw new EngineError('MalformedRequest', 'File parameter required for load command')
        }
        return await loadResponse(engine, id, options.file, undefined, DEFAULT_PREVIEW_ROWS)

      case 'chat':
        if (!options.message?.trim()) {
          throw new EngineError('MalformedRequest', 'Message parameter required for chat command')
        }
        if (options.apiKey) engine.init(options.apiKey)
        return await chatResponse(engine, id, options.message, options.sessionId, DEFAULT_PREVIEW_ROWS)

      case 'summary': {
        const context = engine.summary()
        if (!context) {
          return { id, status: 'success', message: 'No data loaded', data: JSON.stringify({ loaded: false }) }
        }
        return {
          id,
          status: 'success',
          message: `Data loaded: ${context.fileName} (${context.shape.rows} rows x ${context.shape.columns} columns)`,
          data: JSON.stringify({ loaded: true, ...context }, null, 2),
        }
      }

      case 'history': {
        const turns = engine.history(options.sessionId)
        return { id, status: 'success', message: `${turns.length} turns`, data: JSON.stringify(turns, null, 2) }
      }

      case 'clear':
        engine.clear(options.sessionId)
        return { id, status: 'success', message: 'Conversation cleared' }
    }
  } catch (err) {
    console.error(`[BRIDGE] ${command} command failed:`, err)
    return errorResponse(id, err)
  }
}
