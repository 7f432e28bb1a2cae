import type { ChatMessage } from 'agent-arena'
import type { ModelMessage } from 'ai'

const SPEAKERS = { user: 'User', assistant: 'Assistant', system: 'System' } as const

/**
 * Fold earlier turns into a single prompt for agents that only take one
 * message (CLI agents). With no history the message is returned as is.
 */
export function withTranscript(message: string, history: ChatMessage[] = []): string {
  if (history.length === 0) return message

  const lines = history.map((turn) => `${SPEAKERS[turn.role]}: ${turn.content}`)
  return ['Previous conversation:', ...lines, '', `User: ${message}`].join('\n')
}

/** Earlier turns plus the current message, as AI SDK messages */
export function toModelMessages(message: string, history: ChatMessage[] = []): ModelMessage[] {
  const messages: ModelMessage[] = history.map((turn): ModelMessage => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content }
      case 'assistant':
        return { role: 'assistant', content: turn.content }
      case 'user':
        return { role: 'user', content: turn.content }
    }
  })
  messages.push({ role: 'user', content: message })
  return messages
}
