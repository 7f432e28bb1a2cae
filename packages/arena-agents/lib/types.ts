import type { RunOptions, RunResult } from 'agent-arena'
import type { LanguageModel } from 'ai'

/** Model id to AI SDK model; createModel() outside tests */
export type ModelResolver = (modelId: string) => Promise<LanguageModel>

/** Subprocess runner; runWithIdleTimeout() outside tests */
export type CommandRunner = (options: RunOptions) => Promise<RunResult>
