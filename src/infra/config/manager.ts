import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DiffScope, GeneratorConfig, ParseStrategy, TitlePattern } from '../../domain/types';
import { DEFAULT_LOW_VALUE_PATTERNS, ENV_KEYS, FILE_CONSTANTS } from '../../shared/constants';
import { ConfigError } from '../../shared/errors';

// Flat schema for .commitgen.yml - the options a user is expected to touch
export const UserConfigSchema = z
  .object({
    model: z.string().min(1),
    baseURL: z.string().url(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    scope: DiffScope,
    contextLines: z.number().int().min(0),
    parser: ParseStrategy,
    filter: z.boolean(),
    lowValuePatterns: z.array(TitlePattern),
    autoCommit: z.boolean(),
    maxAttempts: z.number().int().positive(),
    fewShot: z.boolean(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;

// CLI flags win over everything else
export type ConfigOverrides = UserConfig & { messageFile?: string };

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class ConfigManager {
  private readonly env: Env;
  private readonly userConfig: UserConfig;

  constructor(private readonly repoRoot: string, env: Env = process.env) {
    this.env = { ...ConfigManager.loadDotEnv(repoRoot), ...env };
    this.userConfig = this.loadUserConfig();
  }

  static configPath(repoRoot: string): string {
    return path.join(repoRoot, FILE_CONSTANTS.CONFIG_FILE);
  }

  // .env values never override variables already set in the environment
  private static loadDotEnv(repoRoot: string): Env {
    const envPath = path.join(repoRoot, FILE_CONSTANTS.ENV_FILE);
    if (!fs.existsSync(envPath)) {
      return {};
    }
    return dotenv.parse(fs.readFileSync(envPath));
  }

  private loadUserConfig(): UserConfig {
    const configPath = ConfigManager.configPath(this.repoRoot);

    let rawConfig: unknown = {};
    if (fs.existsSync(configPath)) {
      try {
        rawConfig = yaml.load(fs.readFileSync(configPath, 'utf-8')) ?? {};
      } catch (error) {
        console.warn(`Failed to load config:`, error instanceof Error ? error.message : error);
      }
    }

    const result = UserConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigError(`Invalid ${FILE_CONSTANTS.CONFIG_FILE}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  // Environment variable overrides on top of the config file
  getUserConfig(): UserConfig {
    const config = { ...this.userConfig };

    const model = this.env[ENV_KEYS.MODEL];
    if (model) config.model = model;

    const baseURL = this.env[ENV_KEYS.BASE_URL];
    if (baseURL) config.baseURL = baseURL;

    const timeout = this.env[ENV_KEYS.TIMEOUT_MS];
    if (timeout) {
      const timeoutMs = Number(timeout);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigError(`${ENV_KEYS.TIMEOUT_MS} must be a positive integer, got "${timeout}"`);
      }
      config.timeoutMs = timeoutMs;
    }

    const verbose = this.env[ENV_KEYS.VERBOSE];
    if (verbose === 'true' || verbose === '1') config.verbose = true;

    return config;
  }

  getApiKey(): string | undefined {
    return this.env[ENV_KEYS.API_KEY] || this.env[ENV_KEYS.GROQ_API_KEY] || undefined;
  }

  /**
   * Resolve the pipeline configuration: defaults, config file, environment, flags.
   */
  build(overrides: ConfigOverrides = {}): GeneratorConfig {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new ConfigError(
        `${ENV_KEYS.API_KEY} (or ${ENV_KEYS.GROQ_API_KEY}) is not set`,
        `Add it to your environment or to ${FILE_CONSTANTS.ENV_FILE} in the repository root`
      );
    }

    const file = this.getUserConfig();
    const o = overrides;

    const result = GeneratorConfig.safeParse({
      provider: {
        apiKey,
        baseURL: o.baseURL ?? file.baseURL,
        model: o.model ?? file.model,
        temperature: o.temperature ?? file.temperature,
        maxTokens: o.maxTokens ?? file.maxTokens,
        timeoutMs: o.timeoutMs ?? file.timeoutMs,
      },
      diff: {
        scope: o.scope ?? file.scope,
        contextLines: o.contextLines ?? file.contextLines,
      },
      parsing: o.parser ?? file.parser,
      filter: {
        enabled: o.filter ?? file.filter,
        patterns: [...DEFAULT_LOW_VALUE_PATTERNS, ...(o.lowValuePatterns ?? file.lowValuePatterns ?? [])],
      },
      commit: {
        auto: o.autoCommit ?? file.autoCommit,
        maxAttempts: o.maxAttempts ?? file.maxAttempts,
        messageFile: o.messageFile,
      },
      prompt: { fewShot: o.fewShot ?? file.fewShot },
      verbose: o.verbose ?? file.verbose,
    });

    if (!result.success) {
      throw new ConfigError(formatIssues(result.error));
    }
    return result.data;
  }

  /**
   * Write a commented default config; returns false when one already exists.
   */
  static createDefault(repoRoot: string): boolean {
    const configPath = ConfigManager.configPath(repoRoot);

    if (fs.existsSync(configPath)) {
      return false;
    }

    fs.writeFileSync(configPath, DEFAULT_CONFIG, 'utf-8');
    return true;
  }
}

const DEFAULT_CONFIG = `# commitgen configuration
# Every option is optional; command-line flags take precedence.

# Model served by the OpenAI-compatible endpoint
model: llama3-8b-8192
# baseURL: https://api.groq.com/openai/v1
temperature: 0.2
maxTokens: 300
# Abort the completion request after this many milliseconds
timeoutMs: 60000

# whole: one commit for everything staged; per-file: one commit per file
scope: whole
# contextLines: 0

# validating: pick the first conventional-commit line; naive: first line as-is
parser: validating
fewShot: true

# Skip titles like "add debug log" or "minor update"
filter: true
# lowValuePatterns:
#   - "fix typo"

autoCommit: false
maxAttempts: 3

# Environment variables:
# COMMITGEN_MODEL, COMMITGEN_BASE_URL, COMMITGEN_TIMEOUT_MS, COMMITGEN_VERBOSE
#
# API key in .env or the environment:
# COMMITGEN_API_KEY=your-key   (or GROQ_API_KEY)
`;
