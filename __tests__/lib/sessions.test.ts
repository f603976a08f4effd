import { describe, it, expect, beforeEach } from 'vitest'
import { DEFAULT_SESSION, SessionStore } from '@/lib/sessions'

let store: SessionStore

beforeEach(() => {
  store = new SessionStore()
})

describe('SessionStore', () => {
  it('should add and retrieve messages in order', () => {
    store.addMessage('s1', 'user', 'Hello')
    store.addMessage('s1', 'assistant', 'Hi there')

    expect(store.getMessages('s1')).toEqual([
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi there' },
    ])
  })

  it('should return copies that do not alter stored turns', () => {
    store.addMessage('s1', 'user', 'Hello')
    const messages = store.getMessages('s1')
    messages[0].content = 'changed'
    messages.push({ role: 'assistant', content: 'extra' })

    expect(store.getMessages('s1')).toEqual([{ role: 'user', content: 'Hello' }])
  })

  it('should keep sessions apart', () => {
    store.addMessage('a', 'user', 'one')
    store.addMessage('b', 'user', 'two')

    expect(store.getMessages('a')).toHaveLength(1)
    expect(store.listSessions()).toEqual(['a', 'b'])
  })

  it('should return an empty history for unknown sessions', () => {
    expect(store.getMessages('nope')).toEqual([])
  })
})

describe('ConversationMemory', () => {
  it('should hold 2N turns after N exchanges and none after clear', () => {
    const memory = store.memory()
    for (let i = 0; i < 3; i++) {
      memory.append({ role: 'user', content: `q${i}` })
      memory.append({ role: 'assistant', content: `a${i}` })
    }
    expect(memory.length).toBe(6)

    memory.clear()
    expect(memory.length).toBe(0)
    expect(memory.all()).toEqual([])
  })

  it('should use the default session when no id is given', () => {
    store.memory().append({ role: 'user', content: 'hi' })
    expect(store.getMessages(DEFAULT_SESSION)).toEqual([{ role: 'user', content: 'hi' }])
    expect(store.memory('other').length).toBe(0)
  })
})
