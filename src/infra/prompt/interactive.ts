import chalk from 'chalk';
import readline from 'readline/promises';
import { parseChoice } from '../../domain/commit/confirmation';
import type { CommitMessage, ConfirmationPrompter, DiffUnit, UserChoice } from '../../domain/types';
import { enOutputs } from '../../templates/outputs/en';

export type AskFn = (question: string) => Promise<string>;

/**
 * Shows the suggestion and asks accept / regenerate / skip until the answer parses.
 */
export class InteractivePrompter implements ConfirmationPrompter {
  constructor(private readonly ask: AskFn = askOnTerminal) {}

  async choose(message: CommitMessage, unit: DiffUnit): Promise<UserChoice> {
    const outputs = enOutputs.generate;

    if (unit.path !== null) {
      console.log(chalk.gray(`\n${unit.path}`));
    }
    console.log(`\n${outputs.suggestedTitle}`);
    console.log(chalk.cyan(message.title));
    if (message.body) {
      console.log(`\n${outputs.suggestedBody}`);
      console.log(message.body);
    }

    for (;;) {
      const choice = parseChoice(await this.ask(`\n${outputs.question} [y]: `));
      if (choice !== null) {
        return choice;
      }
      console.log(chalk.yellow(outputs.invalidChoice));
    }
  }
}

async function askOnTerminal(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
