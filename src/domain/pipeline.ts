import type { Logger } from '../shared/logger';
import { MaxRetriesExceededError } from '../shared/errors';
import { enOutputs } from '../templates/outputs/en';
import { INITIAL_STATE, isTerminal, transition } from './commit/confirmation';
import type { ConfirmationState, TerminalState } from './commit/confirmation';
import { LowValueFilter } from './commit/low-value';
import { parseCommitMessage } from './commit/parser';
import type { GitRepository } from './git/repository';
import { buildPrompt } from './prompt/builder';
import type {
  CommitMessage,
  CompletionProvider,
  ConfirmationPrompter,
  DiffUnit,
  GeneratorConfig,
  RunSummary,
  UnitOutcome,
} from './types';

export interface PipelineDependencies {
  repository: GitRepository;
  provider: CompletionProvider;
  prompter: ConfirmationPrompter;
  logger: Logger;
}

/**
 * Staged diff → prompt → completion → parse → confirm → commit, one unit at a time.
 */
export class CommitPipeline {
  private readonly filter: LowValueFilter | null;

  constructor(private readonly config: GeneratorConfig, private readonly deps: PipelineDependencies) {
    this.filter = config.filter.enabled ? new LowValueFilter(config.filter.patterns) : null;
  }

  async run(): Promise<RunSummary> {
    const units = await this.collectUnits();
    if (units.length === 0) {
      this.deps.logger.warn(enOutputs.generate.noStagedChanges);
      return { noChanges: true, outcomes: [] };
    }

    const outcomes: UnitOutcome[] = [];
    for (const unit of units) {
      const outcome = await this.processUnit(unit);
      outcomes.push(outcome);
      if (outcome.status === 'aborted') {
        this.deps.logger.error(new MaxRetriesExceededError(outcome.attempts).message);
        break;
      }
    }

    return { noChanges: false, outcomes };
  }

  /**
   * One prompt + completion + parse. Exposed so a single attempt can be rerun.
   */
  async generate(unit: DiffUnit): Promise<CommitMessage> {
    const prompt = buildPrompt(unit, { fewShot: this.config.prompt.fewShot });
    this.deps.logger.debug('Prompt:', prompt.user);

    const raw = await this.deps.provider.complete(prompt);
    this.deps.logger.debug('Raw model output:', raw);

    return parseCommitMessage(raw, this.config.parsing);
  }

  private async collectUnits(): Promise<DiffUnit[]> {
    const { repository } = this.deps;
    const diffOptions = { contextLines: this.config.diff.contextLines };

    if (this.config.diff.scope === 'per-file' && this.config.commit.messageFile === undefined) {
      const files = await repository.getStagedFileDiffs(diffOptions);
      return Array.from(files, ([path, diff]) => ({ path, diff }));
    }

    const diff = await repository.getStagedDiff(diffOptions);
    return diff.trim() === '' ? [] : [{ path: null, diff }];
  }

  private async processUnit(unit: DiffUnit): Promise<UnitOutcome> {
    const { logger, prompter } = this.deps;
    const { maxAttempts } = this.config.commit;
    let state: ConfirmationState = INITIAL_STATE;

    logger.info(unit.path === null ? enOutputs.generate.generating : enOutputs.generate.generatingFor(unit.path));

    while (!isTerminal(state)) {
      if (state.kind === 'regenerating') {
        if (state.attempt > 1) {
          logger.info(enOutputs.generate.regenerating);
        }
        const message = await this.generate(unit);
        state = transition(
          state,
          this.filter?.isLowValue(message.title) ? { type: 'low-value' } : { type: 'generated', message },
          maxAttempts
        );
      } else {
        const choice = this.config.commit.auto ? 'yes' : await prompter.choose(state.message, unit);
        state = transition(state, { type: 'choice', choice }, maxAttempts);
      }
    }

    return this.finish(unit, state);
  }

  private async finish(unit: DiffUnit, state: TerminalState): Promise<UnitOutcome> {
    const { logger, repository } = this.deps;
    const attempts = state.attempt;

    switch (state.kind) {
      case 'skipped':
        logger.warn(state.reason === 'low-value' ? enOutputs.generate.lowValue : enOutputs.generate.skipped);
        return { unit, status: 'skipped', reason: state.reason, attempts };

      case 'aborted':
        return { unit, status: 'aborted', attempts };

      case 'confirmed': {
        const file = this.config.commit.messageFile;
        if (file !== undefined) {
          repository.writeMessageFile(state.message, file);
          logger.success(enOutputs.generate.written(file));
          return { unit, status: 'written', message: state.message, attempts, file };
        }

        await repository.commit(state.message, unit.path);
        logger.success(unit.path === null ? enOutputs.generate.committed : enOutputs.generate.committedFile(unit.path));
        return { unit, status: 'committed', message: state.message, attempts };
      }
    }
  }
}
