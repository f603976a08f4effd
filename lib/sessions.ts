import type { Turn } from './types'

export const DEFAULT_SESSION = 'default'

export interface ConversationMemory {
  readonly length: number
  append(turn: Turn): void
  clear(): void
  all(): Turn[]
}

/**
 * Conversation turns keyed by session id. Lives only as long as the process;
 * a host that spawns one process per request starts every request with an
 * empty history.
 */
export class SessionStore {
  private sessions = new Map<string, Turn[]>()

  addMessage(sessionId: string, role: Turn['role'], content: string): Turn {
    const turn: Turn = { role, content }
    const turns = this.sessions.get(sessionId)
    if (turns) {
      turns.push(turn)
    } else {
      this.sessions.set(sessionId, [turn])
    }
    return turn
  }

  getMessages(sessionId: string): Turn[] {
    return (this.sessions.get(sessionId) ?? []).map(t => ({ ...t }))
  }

  clearMessages(sessionId: string): void {
    this.sessions.delete(sessionId)
  }

  listSessions(): string[] {
    return [...this.sessions.keys()]
  }

  memory(sessionId: string = DEFAULT_SESSION): ConversationMemory {
    const store = this
    return {
      get length() {
        return store.sessions.get(sessionId)?.length ?? 0
      },
      append: (turn) => { store.addMessage(sessionId, turn.role, turn.content) },
      clear: () => store.clearMessages(sessionId),
      all: () => store.getMessages(sessionId),
    }
  }
}
