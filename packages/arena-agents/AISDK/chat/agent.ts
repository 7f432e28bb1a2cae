import { BaseAgent, createModel, type InvokeOptions } from 'agent-arena'
import { generateText } from 'ai'
import { toModelMessages } from '../../lib/transcript.ts'
import type { ModelResolver } from '../../lib/types.ts'

const SYSTEM_PROMPT = 'You are a helpful assistant. Answer clearly and concisely.'

/**
 * Plain chat completion through the Vercel AI SDK.
 *
 * Any model id createModel() understands works here: gateway
 * (`openai/gpt-4o`), direct provider (`anthropic:claude-sonnet-4-5`) or a
 * bare provider name.
 */
export class ChatAgent extends BaseAgent {
  readonly framework = 'AISDK'
  readonly name = 'chat'
  readonly displayName = 'AI SDK Chat'
  readonly description = 'Single-turn chat completion with the selected model, no tools.'

  private readonly resolveModel: ModelResolver

  constructor(resolveModel: ModelResolver = createModel) {
    super()
    this.resolveModel = resolveModel
  }

  protected async run(message: string, model: string, _conversationId: string, options: InvokeOptions) {
    const result = await generateText({
      model: await this.resolveModel(model),
      system: SYSTEM_PROMPT,
      messages: toModelMessages(message, options.history),
      abortSignal: options.signal,
    })
    options.logger?.debug(`${result.usage.totalTokens ?? '?'} tokens, finish=${result.finishReason}`)
    return result.text
  }
}
