export class CommitGenError extends Error {
  constructor(message: string, readonly suggestion?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends CommitGenError {}

export class ProviderError extends CommitGenError {
  constructor(message: string, readonly status?: number) {
    super(message, status === 401 ? 'Check COMMITGEN_API_KEY / GROQ_API_KEY' : undefined);
  }
}

export class CommitError extends CommitGenError {
  constructor(message: string, readonly path: string | null = null) {
    super(message);
  }
}

export class MaxRetriesExceededError extends CommitGenError {
  constructor(readonly attempts: number) {
    super(`Maximum retries reached (${attempts}). Aborting commit.`);
  }
}

export class InvalidTransitionError extends CommitGenError {
  constructor(state: string, event: string) {
    super(`Invalid confirmation transition: ${event} in state ${state}`);
  }
}
