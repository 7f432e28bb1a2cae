#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from 'commander'
import pc from 'picocolors'
import { ConfigError, loadConfig, type ArenaConfig } from '../config.ts'
import { createLogger } from '../logger.ts'
import { discoverAgents } from '../registry/discovery.ts'
import { DuplicateAgentError } from '../registry/errors.ts'
import { startArena } from '../server/arena.ts'
import { ApiError, createClient, DEFAULT_URL } from './client.ts'

interface ConfigFlags {
  config?: string
  root: string[]
  host?: string
  port?: number
  models?: string
  invokeTimeout?: number
  debug?: boolean
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function parseInteger(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return n
}

function resolveConfig(flags: ConfigFlags): ArenaConfig {
  return loadConfig({
    file: flags.config,
    overrides: {
      agentRoots: flags.root.length > 0 ? flags.root : undefined,
      models: flags.models ? flags.models.split(',').map((m) => m.trim()).filter(Boolean) : undefined,
      host: flags.host,
      port: flags.port,
      invokeTimeout: flags.invokeTimeout,
    },
  })
}

function fail(error: unknown): never {
  if (error instanceof ApiError) {
    const kind = error.kind ? `, ${error.kind}` : ''
    console.error(pc.red(`Error (HTTP ${error.status}${kind}): ${error.message}`))
  } else if (error instanceof ConfigError || error instanceof DuplicateAgentError) {
    console.error(pc.red(error.message))
  } else {
    console.error(pc.red(`Error: ${error instanceof Error ? error.message : String(error)}`))
  }
  process.exit(1)
}

const program = new Command()

program
  .name('agent-arena')
  .description('Compare AI agent frameworks behind one chat API')
  .version('0.1.0')

program
  .command('serve')
  .description('Discover agents and start the HTTP API')
  .option('-c, --config <file>', 'Config file (default: ./arena.config.yaml)')
  .option('-r, --root <dir>', 'Agent root to scan (repeatable, replaces configured roots)', collect, [])
  .option('--host <host>', 'Host to bind to')
  .option('-p, --port <port>', 'Port to listen on (0 = auto)', parseInteger)
  .option('--models <list>', 'Comma-separated model catalog')
  .option('--invoke-timeout <ms>', 'Deadline per agent call in ms (0 = none)', parseInteger)
  .option('--debug', 'Verbose logging')
  .action(async (flags: ConfigFlags) => {
    const logger = createLogger({ debug: flags.debug || process.env.ARENA_DEBUG === '1' })
    try {
      const arena = await startArena(resolveConfig(flags), logger)
      const shutdown = () => {
        logger.info('Shutting down...')
        arena.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error('Shutdown failed', error)
            process.exit(1)
          }
        )
      }
      process.on('SIGINT', shutdown)
      process.on('SIGTERM', shutdown)
    } catch (error) {
      fail(error)
    }
  })

program
  .command('agents')
  .description('Discover agents locally and list them (no server needed)')
  .option('-c, --config <file>', 'Config file (default: ./arena.config.yaml)')
  .option('-r, --root <dir>', 'Agent root to scan (repeatable)', collect, [])
  .option('--json', 'Output as JSON')
  .option('--debug', 'Verbose logging')
  .action(async (flags: ConfigFlags & { json?: boolean }) => {
    try {
      const config = resolveConfig(flags)
      const logger = flags.debug ? createLogger({ debug: true, log: console.error }) : undefined
      const { registry, report } = await discoverAgents(config.agentRoots, { logger })

      if (flags.json) {
        console.log(
          JSON.stringify(
            {
              frameworks: registry.frameworks(),
              failures: report.failures.map((f) => ({ module: f.modulePath, error: f.message })),
            },
            null,
            2
          )
        )
        return
      }

      if (registry.size === 0) {
        console.log(pc.dim(`No agents found under ${config.agentRoots.join(', ')}`))
      }
      for (const group of registry.frameworks()) {
        console.log(pc.bold(group.name))
        for (const agent of group.agents) {
          console.log(`  ${pc.cyan(agent.name.padEnd(28))} ${agent.displayName}`)
          if (agent.description) console.log(`  ${' '.repeat(28)} ${pc.dim(agent.description)}`)
        }
      }
      for (const failure of report.failures) {
        console.log(pc.yellow(`! ${failure.modulePath}: ${failure.message}`))
      }
    } catch (error) {
      fail(error)
    }
  })

program
  .command('config')
  .description('Show frameworks, agents and models served by a running API')
  .option('-u, --url <url>', 'API base URL', process.env.ARENA_URL ?? DEFAULT_URL)
  .action(async (flags: { url: string }) => {
    try {
      const config = await createClient({ baseUrl: flags.url }).config()
      for (const framework of config.frameworks) {
        console.log(pc.bold(framework.name))
        for (const agent of framework.agents) {
          console.log(`  ${pc.cyan(agent.id)}  ${agent.display_name}`)
        }
      }
      console.log(`${pc.bold('Models')}: ${config.models.join(', ') || pc.dim('(none)')}`)
    } catch (error) {
      fail(error)
    }
  })

program
  .command('chat')
  .description('Send one message to an agent through a running API')
  .argument('<agent>', 'Agent name, or framework/name')
  .argument('<message...>', 'Message text')
  .option('-m, --model <model>', 'Model identifier', 'openai/gpt-4o')
  .option('--conversation <id>', 'Conversation id (default: a new one)')
  .option('-u, --url <url>', 'API base URL', process.env.ARENA_URL ?? DEFAULT_URL)
  .action(async (agent: string, message: string[], flags: { model: string; conversation?: string; url: string }) => {
    try {
      const response = await createClient({ baseUrl: flags.url }).chat({
        agent_name: agent,
        model: flags.model,
        user_prompt: message.join(' '),
        conversation_id: flags.conversation ?? `cli_conv_${Date.now()}`,
      })
      console.log(response)
    } catch (error) {
      fail(error)
    }
  })

program
  .command('health')
  .description('Check that the API is up')
  .option('-u, --url <url>', 'API base URL', process.env.ARENA_URL ?? DEFAULT_URL)
  .action(async (flags: { url: string }) => {
    try {
      const { status } = await createClient({ baseUrl: flags.url, timeout: 5000 }).health()
      console.log(status === 'ok' ? pc.green('ok') : pc.yellow(status))
    } catch (error) {
      fail(error)
    }
  })

program.parseAsync().catch(fail)
