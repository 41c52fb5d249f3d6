import type { GitRepository } from '../domain/git/repository';
import { ErrorHandler } from '../shared/error-handler';
import { enOutputs } from '../templates/outputs/en';
import type { Logger } from '../shared/logger';

export class CliUtils {
  /**
   * Repository root, or exit when run outside a repository
   */
  static async requireGitRepo(repository: GitRepository, logger: Logger): Promise<string> {
    const repoRoot = await repository.getRepoRoot();
    if (!repoRoot) {
      logger.error(enOutputs.cli.notRepository);
      process.exit(1);
    }
    return repoRoot;
  }

  static handleError(operation: string, error: unknown): never {
    ErrorHandler.handle(error, { operation });
    process.exit(1);
  }
}
