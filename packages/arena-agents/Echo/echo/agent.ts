import { BaseAgent, type InvokeOptions } from 'agent-arena'

/**
 * Answers with the message it was given. Needs no model or credentials,
 * so it is the agent to smoke-test a deployment with.
 */
export class EchoAgent extends BaseAgent {
  readonly framework = 'Echo'
  readonly name = 'echo'
  readonly displayName = 'Echo'
  readonly description = 'Repeats your message back. Useful to check the server is wired up.'

  protected async run(message: string, _model: string, _conversationId: string, options: InvokeOptions) {
    options.logger?.debug(`echo ${message.length} chars`)
    return `echo: ${message}`
  }
}
