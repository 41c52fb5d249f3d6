import { COMMIT_CONSTANTS } from '../../shared/constants';
import { enPrompts, FEW_SHOT_EXAMPLES } from '../../templates/prompts/en';
import type { DiffUnit, Prompt } from '../types';

export interface PromptOptions {
  fewShot: boolean;
}

export function buildPrompt(unit: DiffUnit, options: PromptOptions): Prompt {
  const sections = [enPrompts.instructions(COMMIT_CONSTANTS.TYPES)];

  if (options.fewShot) {
    sections.push(FEW_SHOT_EXAMPLES);
  }

  sections.push(unit.path === null ? enPrompts.wholeDiff(unit.diff) : enPrompts.fileDiff(unit.path, unit.diff));

  return {
    system: enPrompts.system,
    user: sections.join('\n\n'),
  };
}
