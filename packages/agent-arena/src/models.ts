import { readFileSync } from 'node:fs'
import { gateway, type LanguageModel } from 'ai'
import { z } from 'zod'
import { AdapterError } from './agents/errors.ts'

const catalogSchema = z.record(z.string(), z.array(z.string().min(1)).min(1))

/**
 * Frontier models per provider. The first model of each provider is the
 * one a bare provider id resolves to.
 */
export const FRONTIER_MODELS: Readonly<Record<string, readonly string[]>> = catalogSchema.parse(
  JSON.parse(readFileSync(new URL('./data/frontier-models.json', import.meta.url), 'utf-8'))
)

/** Default model catalog: every frontier model in gateway format */
export function defaultModelCatalog(): string[] {
  return Object.entries(FRONTIER_MODELS).flatMap(([provider, models]) =>
    models.map((model) => `${provider}/${model}`)
  )
}

type ProviderFactory = (model: string) => LanguageModel

const providerConfigs: Record<string, { package: string; export: string }> = {
  anthropic: { package: '@ai-sdk/anthropic', export: 'anthropic' },
  openai: { package: '@ai-sdk/openai', export: 'openai' },
  deepseek: { package: '@ai-sdk/deepseek', export: 'deepseek' },
  google: { package: '@ai-sdk/google', export: 'google' },
  groq: { package: '@ai-sdk/groq', export: 'groq' },
  mistral: { package: '@ai-sdk/mistral', export: 'mistral' },
  xai: { package: '@ai-sdk/xai', export: 'xai' },
}

// Cache for lazy-loaded providers
const providerCache = new Map<string, ProviderFactory | null>()

async function loadProvider(name: string): Promise<ProviderFactory | null> {
  const cached = providerCache.get(name)
  if (cached !== undefined) return cached

  const config = providerConfigs[name]
  if (!config) return null

  let factory: ProviderFactory | null = null
  try {
    const module: Record<string, unknown> = await import(config.package)
    const candidate = module[config.export]
    if (typeof candidate === 'function') {
      factory = (model: string) => candidate(model)
    }
  } catch {
    // Optional provider package not installed
  }
  providerCache.set(name, factory)
  return factory
}

/**
 * Resolve a model identifier for AI SDK adapters.
 *
 * 1. `provider/model`  → Vercel AI Gateway (needs AI_GATEWAY_API_KEY)
 * 2. `provider:model`  → the provider's own @ai-sdk package, loaded lazily
 * 3. `provider`        → gateway, first frontier model of that provider
 *
 * @throws AdapterError("invalid-model") when the identifier cannot be resolved
 */
export async function createModel(modelId: string): Promise<LanguageModel> {
  if (modelId.includes('/')) {
    return gateway(modelId)
  }

  if (!modelId.includes(':')) {
    const defaults = FRONTIER_MODELS[modelId]
    if (defaults?.[0]) {
      return gateway(`${modelId}/${defaults[0]}`)
    }
    throw new AdapterError(
      'invalid-model',
      `Unknown provider: ${modelId}. Supported: ${Object.keys(FRONTIER_MODELS).join(', ')}`
    )
  }

  const colonIndex = modelId.indexOf(':')
  const provider = modelId.slice(0, colonIndex)
  const modelName = modelId.slice(colonIndex + 1)

  if (!modelName) {
    throw new AdapterError('invalid-model', `Invalid model identifier: ${modelId}. Model name is required.`)
  }

  const config = providerConfigs[provider]
  if (!config) {
    throw new AdapterError(
      'invalid-model',
      `Unknown provider: ${provider}. Supported: ${Object.keys(providerConfigs).join(', ')}. ` +
        `Or use gateway format: provider/model (e.g., openai/gpt-4o)`
    )
  }

  const factory = await loadProvider(provider)
  if (!factory) {
    throw new AdapterError('invalid-model', `Install ${config.package} to use ${provider} models directly`)
  }
  return factory(modelName)
}
