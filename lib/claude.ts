import Anthropic from '@anthropic-ai/sdk'
import type {
  MessageParam, TextBlockParam, Tool, ContentBlock,
} from '@anthropic-ai/sdk/resources/messages'
import { EngineError, errorMessage } from './errors'
import { DEFAULT_MODEL } from './config'
import type { Capability, Decision, DecisionInput, ScratchStep, Turn } from './types'

function withCacheControl(text: string): TextBlockParam {
  return { type: 'text', text, cache_control: { type: 'ephemeral' } }
}

// ========== Message building ==========

export function buildTools(capabilities: Capability[]): Tool[] {
  return capabilities.map(c => ({
    name: c.name,
    description: c.description,
    input_schema: {
      type: 'object' as const,
      properties: {
        request: {
          type: 'string',
          description: 'What the user asked for, in their own words',
        },
      },
    },
  }))
}

function historyMessages(history: Turn[]): MessageParam[] {
  // The API rejects empty text blocks
  return history.map(t => ({ role: t.role, content: t.content || '(empty)' }))
}

function scratchMessages(scratch: ScratchStep[]): MessageParam[] {
  return scratch.flatMap((step): MessageParam[] => [
    {
      role: 'assistant',
      content: [
        ...(step.preamble ? [{ type: 'text' as const, text: step.preamble }] : []),
        { type: 'tool_use' as const, id: step.callId, name: step.capability, input: step.input },
      ],
    },
    {
      role: 'user',
      content: [{ type: 'tool_result' as const, tool_use_id: step.callId, content: step.result }],
    },
  ])
}

export function buildAgentMessages(input: DecisionInput): MessageParam[] {
  return [
    ...historyMessages(input.history),
    { role: 'user', content: input.message },
    ...scratchMessages(input.scratch),
  ]
}

export function parseDecision(content: ContentBlock[]): Decision {
  const preamble = content
    .map(block => (block.type === 'text' ? block.text : ''))
    .join('')
    .trim()

  for (const block of content) {
    if (block.type === 'tool_use') {
      const input = typeof block.input === 'object' && block.input !== null && !Array.isArray(block.input)
        ? Object.fromEntries(Object.entries(block.input))
        : {}
      return { kind: 'invoke', callId: block.id, capability: block.name, input, preamble }
    }
  }

  return {
    kind: 'final',
    output: {
      kind: 'fragments',
      fragments: content.map(block => (block.type === 'text' ? { type: 'text', text: block.text } : { type: block.type })),
    },
  }
}

// ========== Reasoning service ==========

export class ClaudeReasoningService {
  private client: Anthropic

  constructor(
    apiKey: string | undefined = process.env.ANTHROPIC_API_KEY,
    private readonly model: string = DEFAULT_MODEL,
    private readonly options: { maxTokens?: number; temperature?: number } = {},
  ) {
    if (!apiKey) {
      throw new EngineError('NotInitialized', 'ANTHROPIC_API_KEY not found in environment variables or parameters')
    }
    this.client = new Anthropic({ apiKey })
  }

  async decide(input: DecisionInput): Promise<Decision> {
    const start = Date.now()
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.options.maxTokens ?? 4000,
        temperature: this.options.temperature ?? 0.1,
        system: [withCacheControl(input.system)],
        tools: buildTools(input.capabilities),
        messages: buildAgentMessages(input),
      })
      console.warn(`[CLAUDE] ${response.stop_reason} in ${Date.now() - start}ms`)
      return parseDecision(response.content)
    } catch (err) {
      throw new EngineError('ReasoningServiceFailure', `Reasoning service call failed: ${errorMessage(err)}`, { cause: err })
    }
  }
}
