import { CommitPipeline } from '../domain/pipeline';
import { GitHookManager } from '../domain/git/hooks';
import { createGitRunner, GitRepository } from '../domain/git/repository';
import { OpenAICompatibleProvider } from '../infra/api/completion';
import { ConfigManager } from '../infra/config/manager';
import type { ConfigOverrides } from '../infra/config/manager';
import { InteractivePrompter } from '../infra/prompt/interactive';
import { FILE_CONSTANTS } from '../shared/constants';
import { createLogger } from '../shared/logger';
import { enOutputs } from '../templates/outputs/en';
import type { CliActions, HookAction } from './program';
import { CliUtils } from './utils';

export function createActions(cwd: string = process.cwd()): CliActions {
  const repository = new GitRepository(createGitRunner(cwd));

  return {
    async generate(overrides: ConfigOverrides) {
      try {
        const repoRoot = await CliUtils.requireGitRepo(repository, createLogger(false));
        const config = new ConfigManager(repoRoot).build(overrides);
        const logger = createLogger(config.verbose);

        // Diff paths are relative to the top level, not the working directory
        const pipeline = new CommitPipeline(config, {
          repository: new GitRepository(createGitRunner(repoRoot)),
          provider: new OpenAICompatibleProvider(config.provider),
          prompter: new InteractivePrompter(),
          logger,
        });

        const summary = await pipeline.run();
        if (summary.outcomes.some((outcome) => outcome.status === 'aborted')) {
          process.exit(1);
        }
      } catch (error) {
        CliUtils.handleError('generate', error);
      }
    },

    async init() {
      const logger = createLogger(false);
      try {
        const repoRoot = await CliUtils.requireGitRepo(repository, logger);
        const configPath = ConfigManager.configPath(repoRoot);

        if (ConfigManager.createDefault(repoRoot)) {
          logger.success(enOutputs.cli.configCreated(configPath));
        } else {
          logger.info(enOutputs.cli.configExists(configPath));
        }
      } catch (error) {
        CliUtils.handleError('init', error);
      }
    },

    async hook(action: HookAction) {
      const logger = createLogger(false);
      try {
        await CliUtils.requireGitRepo(repository, logger);
        const gitDir = await repository.getGitDir();
        if (!gitDir) {
          throw new Error(`Could not locate the git directory for ${FILE_CONSTANTS.HOOK_NAME}`);
        }

        const hooks = new GitHookManager(gitDir, logger);
        if (action === 'install') {
          hooks.install();
        } else {
          hooks.uninstall();
        }
      } catch (error) {
        CliUtils.handleError(`hook-${action}`, error);
      }
    },
  };
}
