/**
 * OpenAI Codex CLI agent
 * Uses `codex exec` (non-interactive mode) with JSON events
 *
 * @see https://github.com/openai/codex
 */

import {
  AdapterError,
  BaseAgent,
  runWithIdleTimeout,
  type InvokeOptions,
} from 'agent-arena'
import { z } from 'zod'
import { withTranscript } from '../../lib/transcript.ts'
import type { CommandRunner } from '../../lib/types.ts'

// Two event shapes exist across codex releases:
//   {"type":"item.completed","item":{"type":"agent_message","text":"..."}}
//   {"msg":{"type":"agent_message","message":"..."}}
const itemEventSchema = z.object({
  type: z.literal('item.completed'),
  item: z.object({ type: z.literal('agent_message'), text: z.string() }),
})
const msgEventSchema = z.object({
  msg: z.object({ type: z.literal('agent_message'), message: z.string() }),
})
const errorEventSchema = z.union([
  z.object({ type: z.literal('error'), message: z.string() }),
  z.object({ type: z.literal('turn.failed'), error: z.object({ message: z.string() }) }),
])

/**
 * Translate an arena model id into a `--model` value for codex.
 * Only OpenAI models are accepted.
 */
export function toCodexModel(model: string): string {
  const bare = model.replace(/^openai[/:]/, '')
  if (/^(gpt-|o\d|codex)/.test(bare)) {
    return bare
  }
  throw new AdapterError('invalid-model', `Codex only runs OpenAI models, got '${model}'`)
}

/**
 * Extract the last agent message from `codex exec --json` output.
 * Output that is not JSON lines is returned trimmed.
 */
export function parseCodexEvents(stdout: string): string {
  let answer: string | undefined
  let sawEvent = false

  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue
    let event: unknown
    try {
      event = JSON.parse(line)
    } catch {
      continue
    }
    sawEvent = true

    const item = itemEventSchema.safeParse(event)
    if (item.success) {
      answer = item.data.item.text
      continue
    }
    const msg = msgEventSchema.safeParse(event)
    if (msg.success) {
      answer = msg.data.msg.message
      continue
    }
    const failure = errorEventSchema.safeParse(event)
    if (failure.success) {
      const reason = 'error' in failure.data ? failure.data.error.message : failure.data.message
      throw new Error(`codex reported an error: ${reason}`)
    }
  }

  if (answer !== undefined) return answer
  if (sawEvent) throw new Error('codex finished without an agent message')
  return stdout.trim()
}

export class CodexAgent extends BaseAgent {
  readonly framework = 'Codex'
  readonly name = 'codex'
  readonly displayName = 'OpenAI Codex'
  readonly description = 'Runs the codex CLI (codex exec). Needs codex on PATH.'

  private readonly exec: CommandRunner
  private readonly idleTimeout: number

  constructor(exec: CommandRunner = runWithIdleTimeout, idleTimeout = 300_000) {
    super()
    this.exec = exec
    this.idleTimeout = idleTimeout
  }

  protected async run(message: string, model: string, _conversationId: string, options: InvokeOptions) {
    // The server's cwd is not necessarily a git checkout
    const args = [
      'exec',
      '--json',
      '--skip-git-repo-check',
      '--model',
      toCodexModel(model),
      '--',
      withTranscript(message, options.history),
    ]

    const { stdout } = await this.exec({
      command: 'codex',
      args,
      timeout: this.idleTimeout,
      signal: options.signal,
    })
    return parseCodexEvents(stdout)
  }
}
