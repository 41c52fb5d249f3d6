export * from './domain/types';
export { splitDiffByFile, parseBoundaryPath } from './domain/diff/splitter';
export {
  CONVENTIONAL_COMMIT_PATTERN,
  extractFirstValidCommitLine,
  formatCommitMessage,
  isConventionalTitle,
  parseCommitMessage,
  parseNaive,
  parseValidating,
} from './domain/commit/parser';
export { LowValueFilter } from './domain/commit/low-value';
export { transition, parseChoice, isTerminal, INITIAL_STATE } from './domain/commit/confirmation';
export type { ConfirmationEvent, ConfirmationState } from './domain/commit/confirmation';
export { buildPrompt } from './domain/prompt/builder';
export { GitRepository, createGitRunner } from './domain/git/repository';
export type { GitRunner } from './domain/git/repository';
export { GitHookManager } from './domain/git/hooks';
export { CommitPipeline } from './domain/pipeline';
export type { PipelineDependencies } from './domain/pipeline';
export { OpenAICompatibleProvider } from './infra/api/completion';
export { ConfigManager } from './infra/config/manager';
export type { ConfigOverrides, UserConfig } from './infra/config/manager';
export { InteractivePrompter } from './infra/prompt/interactive';
export { createLogger } from './shared/logger';
export type { Logger } from './shared/logger';
export * from './shared/errors';
