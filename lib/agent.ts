import { MAX_AGENT_ITERATIONS } from './config'
import type {
  AgentEvent, AgentOutput, AgentResult, Artifact, CapabilityOutcome, CapabilityRegistry,
  ReasoningService, ScratchStep, Table, Turn,
} from './types'

export const FORCED_STOP_MESSAGE = 'Agent stopped due to iteration limit or time limit.'

export interface AgentLoopOptions {
  message: string
  history: Turn[]
  registry: CapabilityRegistry
  table: Table | null
  reasoning: ReasoningService
  system: string
  maxIterations?: number
  onEvent?: (event: AgentEvent) => void
}

// ========== Output normalization ==========

const OBJECT_ANSWER_FIELDS = ['output', 'text', 'answer']

/**
 * Collapses whatever shape the reasoning service answered with into one
 * display string: fragment texts are concatenated, objects yield their first
 * string answer field, anything else is stringified.
 */
export function normalizeAgentOutput(output: AgentOutput): string {
  switch (output.kind) {
    case 'text':
      return output.text
    case 'fragments':
      return output.fragments
        .map(f => f.text ?? '')
        .join('')
    case 'object': {
      for (const field of OBJECT_ANSWER_FIELDS) {
        const value = output.value[field]
        if (typeof value === 'string') return value
      }
      return JSON.stringify(output.value)
    }
  }
}

function forcedAnswer(steps: ScratchStep[]): string {
  for (let i = steps.length - 1; i >= 0; i--) {
    if (steps[i].preamble.trim()) return steps[i].preamble.trim()
  }
  const last = steps[steps.length - 1]
  return last?.result || FORCED_STOP_MESSAGE
}

// ========== Main Agent Loop ==========

export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentResult> {
  const {
    message, history, registry, table, reasoning, system,
    maxIterations = MAX_AGENT_ITERATIONS,
    onEvent = () => {},
  } = options

  const capabilities = [...registry.values()]
  const scratch: ScratchStep[] = []
  const artifacts: Artifact[] = []

  for (let step = 1; step <= maxIterations; step++) {
    const decision = await reasoning.decide({ system, history, message, scratch: [...scratch], capabilities })
    onEvent({ type: 'decision', data: { step, decision: decision.kind } })

    if (decision.kind === 'final') {
      const answer = normalizeAgentOutput(decision.output).trim()
      onEvent({ type: 'final', data: { answer, steps: step } })
      return { answer, output: decision.output, artifacts, steps: scratch, forced: false }
    }

    onEvent({ type: 'capability_start', data: { step, capability: decision.capability } })

    const capability = registry.get(decision.capability)
    const outcome: CapabilityOutcome = capability
      ? await capability.invoke(table)
      : { text: `Unknown capability '${decision.capability}'. Available: ${capabilities.map(c => c.name).join(', ')}` }

    if (outcome.artifact) artifacts.push(outcome.artifact)

    scratch.push({
      callId: decision.callId,
      capability: decision.capability,
      input: decision.input,
      preamble: decision.preamble,
      result: outcome.text,
    })

    onEvent({
      type: 'capability_complete',
      data: { step, capability: decision.capability, result: outcome.text, artifact: outcome.artifact },
    })
  }

  const answer = forcedAnswer(scratch)
  onEvent({ type: 'forced', data: { answer, steps: maxIterations } })
  return { answer, output: null, artifacts, steps: scratch, forced: true }
}
