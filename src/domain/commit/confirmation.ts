import { InvalidTransitionError } from '../../shared/errors';
import type { CommitMessage, UserChoice } from '../types';

export type ConfirmationState =
  | { kind: 'regenerating'; attempt: number }
  | { kind: 'generated'; attempt: number; message: CommitMessage }
  | { kind: 'confirmed'; attempt: number; message: CommitMessage }
  | { kind: 'skipped'; attempt: number; reason: 'user' | 'low-value' }
  | { kind: 'aborted'; attempt: number };

export type ConfirmationEvent =
  | { type: 'generated'; message: CommitMessage }
  | { type: 'low-value' }
  | { type: 'choice'; choice: UserChoice };

export type TerminalState = Extract<ConfirmationState, { kind: 'confirmed' | 'skipped' | 'aborted' }>;

export const INITIAL_STATE: ConfirmationState = { kind: 'regenerating', attempt: 1 };

export function isTerminal(state: ConfirmationState): state is TerminalState {
  return state.kind === 'confirmed' || state.kind === 'skipped' || state.kind === 'aborted';
}

function describeEvent(event: ConfirmationEvent): string {
  return event.type === 'choice' ? `choice(${event.choice})` : event.type;
}

export function transition(
  state: ConfirmationState,
  event: ConfirmationEvent,
  maxAttempts: number
): ConfirmationState {
  if (state.kind === 'regenerating') {
    if (event.type === 'generated') {
      return { kind: 'generated', attempt: state.attempt, message: event.message };
    }
    if (event.type === 'low-value') {
      return { kind: 'skipped', attempt: state.attempt, reason: 'low-value' };
    }
  }

  if (state.kind === 'generated' && event.type === 'choice') {
    switch (event.choice) {
      case 'yes':
        return { kind: 'confirmed', attempt: state.attempt, message: state.message };
      case 'skip':
        return { kind: 'skipped', attempt: state.attempt, reason: 'user' };
      case 'regenerate':
        return state.attempt < maxAttempts
          ? { kind: 'regenerating', attempt: state.attempt + 1 }
          : { kind: 'aborted', attempt: state.attempt };
    }
  }

  throw new InvalidTransitionError(state.kind, describeEvent(event));
}

const CHOICES: Record<string, UserChoice> = {
  '': 'yes',
  y: 'yes',
  yes: 'yes',
  r: 'regenerate',
  regenerate: 'regenerate',
  s: 'skip',
  skip: 'skip',
  n: 'skip',
  no: 'skip',
};

/**
 * Map a typed answer to a choice; null means ask again.
 */
export function parseChoice(answer: string): UserChoice | null {
  const key = answer.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(CHOICES, key) ? CHOICES[key] : null;
}
