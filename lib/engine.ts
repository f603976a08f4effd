import { runAgentLoop } from './agent'
import { createCapabilityRegistry } from './capabilities'
import { ArtifactNamer, MatplotlibRenderer, type ChartRenderer } from './charts'
import { ClaudeReasoningService } from './claude'
import { MAX_AGENT_ITERATIONS, loadConfig, type AppConfig } from './config'
import { DatasetHolder, type LoadResult } from './dataset'
import { EngineError } from './errors'
import { buildAnalystSystem } from './prompts'
import { DEFAULT_SESSION, SessionStore } from './sessions'
import type {
  AgentEvent, CapabilityRegistry, DatasetContext, ReasoningService, Table, Turn,
} from './types'

export interface EngineOptions {
  config?: AppConfig
  renderer?: ChartRenderer
  namer?: ArtifactNamer
  store?: SessionStore
  reasoning?: ReasoningService
  reasoningFactory?: (apiKey: string | undefined, config: AppConfig) => ReasoningService
  maxIterations?: number
}

export interface ChatResult {
  answer: string
  charts: string[]
  forced: boolean
}

export class AnalysisEngine {
  readonly config: AppConfig
  readonly dataset: DatasetHolder
  readonly registry: CapabilityRegistry
  private readonly store: SessionStore
  private readonly reasoningFactory: NonNullable<EngineOptions['reasoningFactory']>
  private readonly maxIterations: number
  private reasoning: ReasoningService | null

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? loadConfig()
    this.dataset = new DatasetHolder(this.config.inputDir)
    this.store = options.store ?? new SessionStore()
    this.registry = createCapabilityRegistry({
      renderer: options.renderer ?? new MatplotlibRenderer({
        pythonPath: this.config.pythonPath,
        timeout: this.config.renderTimeout,
      }),
      namer: options.namer ?? new ArtifactNamer(this.config.outputDir),
    })
    this.reasoning = options.reasoning ?? null
    this.reasoningFactory = options.reasoningFactory
      ?? ((apiKey, config) => new ClaudeReasoningService(apiKey ?? config.apiKey, config.model))
    this.maxIterations = options.maxIterations ?? MAX_AGENT_ITERATIONS
  }

  get initialized(): boolean {
    return this.reasoning !== null
  }

  get table(): Table | null {
    return this.dataset.table
  }

  /** Creates the reasoning service; throws NotInitialized when no API key is available */
  init(apiKey?: string): void {
    if (this.reasoning && !apiKey) return
    try {
      this.reasoning = this.reasoningFactory(apiKey, this.config)
    } catch (err) {
      if (err instanceof EngineError) {
        throw new EngineError('NotInitialized', `Failed to initialize agent: ${err.message}`, { cause: err })
      }
      throw err
    }
  }

  loadData(filePath: string, displayName?: string): Promise<LoadResult> {
    return this.dataset.load(filePath, displayName)
  }

  summary(): DatasetContext | null {
    return this.dataset.summary()
  }

  history(sessionId: string = DEFAULT_SESSION): Turn[] {
    return this.store.memory(sessionId).all()
  }

  clear(sessionId: string = DEFAULT_SESSION): void {
    this.store.memory(sessionId).clear()
  }

  async chat(
    message: string,
    options: { sessionId?: string; onEvent?: (event: AgentEvent) => void } = {},
  ): Promise<ChatResult> {
    if (!this.reasoning) {
      throw new EngineError('NotInitialized', 'Agent not initialized')
    }

    const memory = this.store.memory(options.sessionId)
    const capabilities = [...this.registry.values()]

    const result = await runAgentLoop({
      message,
      history: memory.all(),
      registry: this.registry,
      table: this.dataset.table,
      reasoning: this.reasoning,
      system: buildAnalystSystem(capabilities, this.dataset.summary()),
      maxIterations: this.maxIterations,
      onEvent: options.onEvent,
    })

    memory.append({ role: 'user', content: message })
    memory.append({ role: 'assistant', content: result.answer })

    return {
      answer: result.answer,
      charts: result.artifacts.map(a => a.fileName),
      forced: result.forced,
    }
  }
}
