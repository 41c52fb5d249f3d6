import { COMMIT_CONSTANTS } from '../../shared/constants';
import { CommitType } from '../types';
import type { CommitMessage, ParseStrategy } from '../types';

export const CONVENTIONAL_COMMIT_PATTERN = new RegExp(
  `^(${CommitType.options.join('|')})(\\([\\w-]+\\))?: .+`
);

const CODE_FENCE = /^\s*```/;

function stripBold(line: string): string {
  return line.replace(/\*\*/g, '').trim();
}

export function isConventionalTitle(title: string): boolean {
  return CONVENTIONAL_COMMIT_PATTERN.test(title);
}

/**
 * First line is the title, everything after it is the body.
 */
export function parseNaive(raw: string): CommitMessage {
  const content = raw.trim();
  const newline = content.indexOf('\n');
  if (newline === -1) {
    return { title: content, body: '' };
  }
  return {
    title: content.slice(0, newline).trim(),
    body: content.slice(newline + 1).trim(),
  };
}

function findValidLine(lines: string[]): number {
  return lines.findIndex((line) => isConventionalTitle(stripBold(line)));
}

/**
 * Scan model output for the first line that is a conventional commit title,
 * ignoring preambles and markdown bold. Falls back to `chore: update`.
 */
export function extractFirstValidCommitLine(raw: string): string {
  const lines = raw.split(/\r?\n/);
  const index = findValidLine(lines);
  return index === -1 ? COMMIT_CONSTANTS.FALLBACK_TITLE : stripBold(lines[index]);
}

export function parseValidating(raw: string): CommitMessage {
  const lines = raw.split(/\r?\n/);
  const index = findValidLine(lines);
  if (index === -1) {
    return { title: COMMIT_CONSTANTS.FALLBACK_TITLE, body: '' };
  }

  const body = lines
    .slice(index + 1)
    .filter((line) => !CODE_FENCE.test(line))
    .join('\n')
    .trim();

  return { title: stripBold(lines[index]), body };
}

export function parseCommitMessage(raw: string, strategy: ParseStrategy): CommitMessage {
  return strategy === 'naive' ? parseNaive(raw) : parseValidating(raw);
}

export function formatCommitMessage(message: CommitMessage): string {
  return message.body ? `${message.title}\n\n${message.body}` : message.title;
}
