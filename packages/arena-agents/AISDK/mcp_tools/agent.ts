import {
  AdapterError,
  BaseAgent,
  createMcpToolBridge,
  createModel,
  loadMcpConfig,
  type InvokeOptions,
  type McpConfig,
  type McpToolBridge,
  type Logger,
} from 'agent-arena'
import { generateText, stepCountIs } from 'ai'
import { toModelMessages } from '../../lib/transcript.ts'
import type { ModelResolver } from '../../lib/types.ts'

export type ToolConnector = (config: McpConfig, options: { logger?: Logger }) => Promise<McpToolBridge>

const MAX_STEPS = 10

const SYSTEM_PROMPT =
  'You are a helpful assistant with access to external tools. ' +
  'Use them when they help answer the question, then reply in plain text.'

const connectTools: ToolConnector = (config, options) =>
  createMcpToolBridge(config, { clientName: 'arena-mcp-tools', logger: options.logger })

/**
 * Tool-using agent: connects to the MCP servers in the arena's MCP
 * config, exposes their tools to the model and lets it call them for up
 * to MAX_STEPS steps. Connections live for one invocation.
 */
export class McpToolsAgent extends BaseAgent {
  readonly framework = 'AISDK'
  readonly name = 'mcp_tools'
  readonly displayName = 'AI SDK + MCP Tools'
  readonly description = 'Chat agent that can call tools from the configured MCP servers.'

  private readonly resolveModel: ModelResolver
  private readonly connect: ToolConnector

  constructor(resolveModel: ModelResolver = createModel, connect: ToolConnector = connectTools) {
    super()
    this.resolveModel = resolveModel
    this.connect = connect
  }

  protected async run(message: string, model: string, _conversationId: string, options: InvokeOptions) {
    if (!options.mcpConfigPath) {
      throw new AdapterError('upstream-error', 'No MCP config set (mcpConfig in arena.config.yaml)')
    }
    const config = loadMcpConfig(options.mcpConfigPath)
    if (Object.keys(config).length === 0) {
      throw new AdapterError('upstream-error', `No MCP servers configured in ${options.mcpConfigPath}`)
    }

    const languageModel = await this.resolveModel(model)
    const bridge = await this.connect(config, { logger: options.logger })
    try {
      if (bridge.servers.length === 0) {
        throw new AdapterError('upstream-error', 'None of the configured MCP servers could be reached')
      }
      options.logger?.debug(`Tools: ${Object.keys(bridge.tools).join(', ') || '(none)'}`)

      const result = await generateText({
        model: languageModel,
        system: SYSTEM_PROMPT,
        messages: toModelMessages(message, options.history),
        tools: bridge.tools,
        stopWhen: stepCountIs(MAX_STEPS),
        abortSignal: options.signal,
      })
      return result.text
    } finally {
      await bridge.close()
    }
  }
}
