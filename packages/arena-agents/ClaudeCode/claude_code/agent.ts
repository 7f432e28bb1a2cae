/**
 * Claude Code CLI agent
 * Uses `claude -p` (print mode) with JSON output
 *
 * @see https://docs.anthropic.com/en/docs/claude-code
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

const resultSchema = z.object({
  result: z.string(),
  is_error: z.boolean().optional(),
})

const ALIASES = new Set(['sonnet', 'opus', 'haiku'])

/**
 * Translate an arena model id into a `--model` value for the claude CLI.
 * Only Anthropic models are accepted.
 */
export function toClaudeModel(model: string): string {
  const bare = model.replace(/^anthropic[/:]/, '')
  if (ALIASES.has(bare) || bare.startsWith('claude-')) {
    return bare
  }
  throw new AdapterError('invalid-model', `Claude Code only runs Anthropic models, got '${model}'`)
}

/** Pull the answer out of `--output-format json` output; plain text passes through */
export function parseClaudeOutput(stdout: string): string {
  let raw: unknown
  try {
    raw = JSON.parse(stdout)
  } catch {
    return stdout.trim()
  }
  const parsed = resultSchema.safeParse(raw)
  if (!parsed.success) {
    return stdout.trim()
  }
  if (parsed.data.is_error) {
    throw new Error(`claude reported an error: ${parsed.data.result}`)
  }
  return parsed.data.result
}

export class ClaudeCodeAgent extends BaseAgent {
  readonly framework = 'ClaudeCode'
  readonly name = 'claude_code'
  readonly displayName = 'Claude Code'
  readonly description = 'Runs the claude CLI in non-interactive mode. Needs claude on PATH.'

  private readonly exec: CommandRunner
  private readonly idleTimeout: number

  constructor(exec: CommandRunner = runWithIdleTimeout, idleTimeout = 300_000) {
    super()
    this.exec = exec
    this.idleTimeout = idleTimeout
  }

  protected async run(message: string, model: string, _conversationId: string, options: InvokeOptions) {
    // -p: non-interactive print mode; '--' keeps a prompt starting with '-' positional
    const flags = ['-p', '--model', toClaudeModel(model), '--output-format', 'json']
    const args = [...flags, '--', withTranscript(message, options.history)]
    options.logger?.debug(`claude ${flags.join(' ')}`)

    const { stdout } = await this.exec({
      command: 'claude',
      args,
      timeout: this.idleTimeout,
      signal: options.signal,
    })
    return parseClaudeOutput(stdout)
  }
}
