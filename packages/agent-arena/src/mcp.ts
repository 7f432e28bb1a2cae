/**
 * MCP tool configuration and AI SDK tool bridge.
 *
 * The config file maps a server name to a connection:
 *
 * ```json
 * {
 *   "weather": { "url": "http://localhost:8005/mcp/", "transport": "streamable_http" },
 *   "search":  { "command": "node", "args": ["search-server.js"], "transport": "stdio" }
 * }
 * ```
 *
 * The core never reads this file; adapters that want MCP tools do,
 * with the path they receive in InvokeOptions.
 */

import { existsSync, readFileSync } from 'node:fs'
import { jsonSchema, tool, type ToolSet } from 'ai'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { createSilentLogger, type Logger } from './logger.ts'

const httpServerSchema = z.object({
  url: z.string().url(),
  transport: z.enum(['streamable_http', 'http']).default('streamable_http'),
  headers: z.record(z.string(), z.string()).optional(),
})

const stdioServerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  transport: z.literal('stdio').default('stdio'),
})

const mcpConfigSchema = z.record(z.string(), z.union([httpServerSchema, stdioServerSchema]))

export type McpServerConfig = z.infer<typeof mcpConfigSchema>[string]
export type McpConfig = z.infer<typeof mcpConfigSchema>

/**
 * Read and validate an MCP config file.
 * A missing file yields an empty config.
 */
export function loadMcpConfig(path: string): McpConfig {
  if (!existsSync(path)) {
    return {}
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    throw new Error(`Invalid MCP config ${path}: ${error instanceof Error ? error.message : String(error)}`)
  }

  const result = mcpConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid MCP config ${path}: ${issues}`)
  }
  return result.data
}

export interface McpToolBridge {
  tools: ToolSet
  /** Servers that connected */
  servers: string[]
  close: () => Promise<void>
}

function createTransport(server: McpServerConfig) {
  if ('url' in server) {
    return new StreamableHTTPClientTransport(new URL(server.url), {
      requestInit: server.headers ? { headers: server.headers } : undefined,
    })
  }
  return new StdioClientTransport({ command: server.command, args: server.args, env: server.env })
}

/**
 * Connect to every configured MCP server and wrap its tools as AI SDK tools.
 *
 * A server that fails to connect is logged and left out. When two servers
 * expose the same tool name, the later one is registered as
 * `<server>_<tool>`.
 */
export async function createMcpToolBridge(
  config: McpConfig,
  options: { clientName?: string; logger?: Logger } = {}
): Promise<McpToolBridge> {
  const logger = options.logger ?? createSilentLogger()
  const clients: Client[] = []
  const servers: string[] = []
  const tools: ToolSet = {}

  for (const [serverName, server] of Object.entries(config)) {
    const client = new Client({ name: options.clientName ?? 'agent-arena', version: '0.1.0' })
    let mcpTools: Tool[]
    try {
      await client.connect(createTransport(server))
      mcpTools = (await client.listTools()).tools
    } catch (error) {
      logger.warn(`MCP server '${serverName}' unavailable`, error)
      await client.close().catch((closeError: unknown) => logger.debug(`Closing '${serverName}' failed`, closeError))
      continue
    }
    clients.push(client)
    servers.push(serverName)

    for (const mcpTool of mcpTools) {
      const toolName = mcpTool.name in tools ? `${serverName}_${mcpTool.name}` : mcpTool.name
      tools[toolName] = tool({
        description: mcpTool.description || mcpTool.name,
        inputSchema: jsonSchema<Record<string, unknown>>(mcpTool.inputSchema as Parameters<typeof jsonSchema>[0]),
        // The model sees the full MCP result (content blocks, isError)
        execute: (args) => client.callTool({ name: mcpTool.name, arguments: args }),
      })
    }
    logger.debug(`MCP server '${serverName}': ${mcpTools.length} tool(s)`)
  }

  return {
    tools,
    servers,
    close: async () => {
      await Promise.allSettled(clients.map((c) => c.close()))
    },
  }
}
