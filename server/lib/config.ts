import { fileURLToPath } from 'url'
import { ConfigError } from './errors'

export interface ServerConfig {
  port: number
  corsOrigin: string
  dictionaryPath: string
  wordlistsVersion: string
  maxWordLength: number
}

// Bundled word list, used when DICTIONARY_PATH is unset.
export const DEFAULT_DICTIONARY_PATH = fileURLToPath(new URL('./data/dictionary.txt', import.meta.url))

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

/**
 * Reads server settings from the environment. Unset variables fall back to the defaults;
 * a malformed PORT or MAX_WORD_LENGTH throws a ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt('PORT', env.PORT, 4000),
    // Allow CORS for any client unless narrowed
    corsOrigin: env.CORS_ORIGIN || '*',
    dictionaryPath: env.DICTIONARY_PATH || DEFAULT_DICTIONARY_PATH,
    wordlistsVersion: env.WORDLISTS_VERSION || 'v1',
    maxWordLength: positiveInt('MAX_WORD_LENGTH', env.MAX_WORD_LENGTH, 32)
  }
}
