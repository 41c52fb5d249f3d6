import { Command, InvalidArgumentError, Option } from 'commander';
import { ParseStrategy } from '../domain/types';
import type { ConfigOverrides } from '../infra/config/manager';

export interface GenerateOptions {
  perFile?: boolean;
  squash?: boolean;
  yes?: boolean;
  parser?: ParseStrategy;
  filter?: boolean;
  examples?: boolean;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
  context?: number;
  messageFile?: string;
  verbose?: boolean;
}

export type HookAction = 'install' | 'uninstall';

export interface CliActions {
  generate(overrides: ConfigOverrides): Promise<void>;
  init(): Promise<void>;
  hook(action: HookAction): Promise<void>;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 2) {
    throw new InvalidArgumentError('Must be a number between 0 and 2.');
  }
  return parsed;
}

function parseStrategy(value: string): ParseStrategy {
  const result = ParseStrategy.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${ParseStrategy.options.join(', ')}.`);
  }
  return result.data;
}

function parseHookAction(value: string): HookAction {
  if (value !== 'install' && value !== 'uninstall') {
    throw new InvalidArgumentError('Expected install or uninstall.');
  }
  return value;
}

export function toOverrides(options: GenerateOptions): ConfigOverrides {
  return {
    scope: options.perFile ? 'per-file' : options.squash ? 'whole' : undefined,
    autoCommit: options.yes,
    parser: options.parser,
    filter: options.filter,
    fewShot: options.examples,
    model: options.model,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    timeoutMs: options.timeout,
    contextLines: options.context,
    messageFile: options.messageFile,
    verbose: options.verbose,
  };
}

export function createProgram(actions: CliActions): Command {
  const program = new Command();

  program
    .name('commitgen')
    .description('Generate Conventional Commits messages for staged changes via an LLM')
    .version('0.1.0');

  program
    .command('generate', { isDefault: true })
    .description('Generate a commit message for the staged changes and optionally commit')
    .addOption(new Option('--per-file', 'one commit per staged file').conflicts('squash'))
    .option('--squash', 'one commit for all staged changes (default)')
    .option('-y, --yes', 'commit without asking for confirmation')
    .option('--parser <strategy>', 'naive | validating', parseStrategy)
    .option('--filter', 'skip low-value commit titles (default)')
    .option('--no-filter', 'do not skip low-value commit titles')
    .option('--examples', 'include few-shot examples in the prompt (default)')
    .option('--no-examples', 'leave few-shot examples out of the prompt')
    .option('-m, --model <id>', 'model identifier')
    .option('--temperature <n>', 'sampling temperature', parseTemperature)
    .option('--max-tokens <n>', 'maximum output tokens', parsePositiveInt)
    .option('--timeout <ms>', 'completion request timeout in milliseconds', parsePositiveInt)
    .option('-U, --context <n>', 'diff context lines', parseNonNegativeInt)
    .option('--message-file <path>', 'write the message to this file instead of committing')
    .option('-v, --verbose', 'echo the prompt and raw model output')
    .action(async (options: GenerateOptions) => {
      await actions.generate(toOverrides(options));
    });

  program
    .command('init')
    .description('Create .commitgen.yml in the repository root')
    .action(async () => {
      await actions.init();
    });

  program
    .command('hook')
    .argument('<action>', 'install | uninstall', parseHookAction)
    .description('Install or remove the prepare-commit-msg hook')
    .action(async (action: HookAction) => {
      await actions.hook(action);
    });

  return program;
}
