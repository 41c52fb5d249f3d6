import { z } from 'zod';
import { COMMIT_CONSTANTS, DEFAULT_LOW_VALUE_PATTERNS, LLM_CONSTANTS } from '../shared/constants';

// Conventional commit type
export const CommitType = z.enum(COMMIT_CONSTANTS.TYPES);
export type CommitType = z.infer<typeof CommitType>;

// Whole repository in one commit, or one commit per file
export const DiffScope = z.enum(['whole', 'per-file']);
export type DiffScope = z.infer<typeof DiffScope>;

export const ParseStrategy = z.enum(['naive', 'validating']);
export type ParseStrategy = z.infer<typeof ParseStrategy>;

export const ProviderConfig = z.object({
  apiKey: z.string().min(1),
  baseURL: z.string().url().default(LLM_CONSTANTS.DEFAULT_BASE_URL),
  model: z.string().min(1).default(LLM_CONSTANTS.DEFAULT_MODEL),
  temperature: z.number().min(0).max(2).default(LLM_CONSTANTS.TEMPERATURE),
  maxTokens: z.number().int().positive().default(LLM_CONSTANTS.MAX_TOKENS),
  timeoutMs: z.number().int().positive().default(LLM_CONSTANTS.TIMEOUT_MS),
});

export const DiffConfig = z.object({
  scope: DiffScope.default('whole'),
  contextLines: z.number().int().min(0).optional(),
});

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

// A title pattern, compiled case-insensitively by the low-value filter
export const TitlePattern = z.string().refine(compiles, { message: 'Invalid regular expression' });

export const FilterConfig = z.object({
  enabled: z.boolean().default(true),
  patterns: z.array(TitlePattern).default([...DEFAULT_LOW_VALUE_PATTERNS]),
});

export const CommitConfig = z.object({
  auto: z.boolean().default(false),
  maxAttempts: z.number().int().positive().default(COMMIT_CONSTANTS.MAX_ATTEMPTS),
  messageFile: z.string().optional(),
});

export const PromptConfig = z.object({
  fewShot: z.boolean().default(true),
});

export const GeneratorConfig = z.object({
  provider: ProviderConfig,
  diff: DiffConfig.default({}),
  parsing: ParseStrategy.default('validating'),
  filter: FilterConfig.default({}),
  commit: CommitConfig.default({}),
  prompt: PromptConfig.default({}),
  verbose: z.boolean().default(false),
});
export type GeneratorConfig = z.infer<typeof GeneratorConfig>;

export interface CommitMessage {
  title: string;
  body: string;
}

// path is null when the whole staged diff is one unit
export interface DiffUnit {
  path: string | null;
  diff: string;
}

export type FileDiffs = Map<string, string>;

export interface Prompt {
  system: string;
  user: string;
}

export type UserChoice = 'yes' | 'regenerate' | 'skip';

export interface CompletionProvider {
  complete(prompt: Prompt): Promise<string>;
}

export interface ConfirmationPrompter {
  choose(message: CommitMessage, unit: DiffUnit): Promise<UserChoice>;
}

export type UnitOutcome =
  | { unit: DiffUnit; status: 'committed'; message: CommitMessage; attempts: number }
  | { unit: DiffUnit; status: 'written'; message: CommitMessage; attempts: number; file: string }
  | { unit: DiffUnit; status: 'skipped'; reason: 'user' | 'low-value'; attempts: number }
  | { unit: DiffUnit; status: 'aborted'; attempts: number };

export interface RunSummary {
  noChanges: boolean;
  outcomes: UnitOutcome[];
}
