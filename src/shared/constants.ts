/**
 * commitgen constants
 * Opinionated defaults live here; everything else is overridable from config
 */

// LLM request defaults
export const LLM_CONSTANTS = {
  DEFAULT_MODEL: 'llama3-8b-8192',
  DEFAULT_BASE_URL: 'https://api.groq.com/openai/v1',
  TEMPERATURE: 0.2,
  MAX_TOKENS: 300,
  TIMEOUT_MS: 60_000,
} as const;

// Conventional Commits
export const COMMIT_CONSTANTS = {
  TYPES: ['feat', 'fix', 'chore', 'docs', 'refactor', 'style', 'test'],
  FALLBACK_TITLE: 'chore: update',
  MAX_ATTEMPTS: 3,
} as const;

// Titles matching any of these are skipped without asking
export const DEFAULT_LOW_VALUE_PATTERNS = [
  '(add|remove) debug',
  '(print|log)\\s+statement',
  'minor\\s+(change|update)',
] as const;

export const FILE_CONSTANTS = {
  CONFIG_FILE: '.commitgen.yml',
  ENV_FILE: '.env',
  HOOK_NAME: 'prepare-commit-msg',
  HOOK_MARKER: 'commitgen',
  BACKUP_SUFFIX: '.commitgen-backup',
} as const;

// Environment variables read by the config manager
export const ENV_KEYS = {
  API_KEY: 'COMMITGEN_API_KEY',
  GROQ_API_KEY: 'GROQ_API_KEY',
  MODEL: 'COMMITGEN_MODEL',
  BASE_URL: 'COMMITGEN_BASE_URL',
  TIMEOUT_MS: 'COMMITGEN_TIMEOUT_MS',
  VERBOSE: 'COMMITGEN_VERBOSE',
  DEBUG: 'COMMITGEN_DEBUG',
} as const;
