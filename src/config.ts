import { resolve } from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'

// Empty strings in CI env blocks (`FOO: ${{ secrets.FOO }}` with no secret)
// should behave like unset variables.
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
)

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  SCRIPT_PROVIDER: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
    z.enum(['gemini', 'anthropic']).default('gemini'),
  ),
  TARGET_REPO: optionalString,
  GITHUB_TOKEN: optionalString,
  GITHUB_REPOSITORY: optionalString,
  COMIC_DIR: optionalString,
  GEMINI_TEXT_MODEL: optionalString,
  GEMINI_IMAGE_MODEL: optionalString,
  ANTHROPIC_MODEL: optionalString,
  REQUEST_TIMEOUT_MS: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(120_000),
  ),
})

export type ScriptProvider = 'gemini' | 'anthropic'

export interface ComicConfig {
  geminiApiKey?: string
  anthropicApiKey?: string
  scriptProvider: ScriptProvider
  /** owner/name of the repository whose commits are drawn */
  sourceRepo: string
  githubToken?: string
  /** owner/name that releases and issues are published into */
  publishRepo?: string
  outputDir: string
  geminiTextModel: string
  geminiImageModel: string
  anthropicModel: string
  requestTimeoutMs: number
  perPage: number
  panelAttempts: number
  retryDelayMs: number
  panelDelayMs: number
  panelGap: number
  jpegQuality: number
}

export const DEFAULT_SOURCE_REPO = 'octocat/Hello-World'
export const DEFAULT_COMIC_DIR = 'comic-strips'

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ComicConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new ConfigError(`Invalid environment: ${issues}`)
  }
  const e = parsed.data

  return {
    geminiApiKey: e.GEMINI_API_KEY,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    scriptProvider: e.SCRIPT_PROVIDER,
    sourceRepo: e.TARGET_REPO ?? DEFAULT_SOURCE_REPO,
    githubToken: e.GITHUB_TOKEN,
    publishRepo: e.GITHUB_REPOSITORY,
    outputDir: resolve(e.COMIC_DIR ?? DEFAULT_COMIC_DIR),
    geminiTextModel: e.GEMINI_TEXT_MODEL ?? 'gemini-2.0-flash',
    geminiImageModel: e.GEMINI_IMAGE_MODEL ?? 'gemini-2.0-flash-exp-image-generation',
    anthropicModel: e.ANTHROPIC_MODEL ?? 'claude-sonnet-4-6',
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    perPage: 100,
    panelAttempts: 3,
    retryDelayMs: 5_000,
    panelDelayMs: 2_000,
    panelGap: 20,
    jpegQuality: 85,
  }
}

export interface ApiKeys {
  gemini: string
  anthropic?: string
}

/**
 * Keys needed to generate a comic. Publishing from a saved record needs none,
 * so this is checked by the generate path only.
 */
export function requireApiKeys(config: ComicConfig): ApiKeys {
  if (!config.geminiApiKey) {
    throw new ConfigError(
      'GEMINI_API_KEY is not set — get one at https://aistudio.google.com/app/apikey',
    )
  }
  if (config.scriptProvider === 'anthropic' && !config.anthropicApiKey) {
    throw new ConfigError('SCRIPT_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set')
  }
  return { gemini: config.geminiApiKey, anthropic: config.anthropicApiKey }
}
