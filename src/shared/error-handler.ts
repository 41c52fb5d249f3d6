import chalk from 'chalk';
import { CommitGenError, ConfigError, ProviderError } from './errors';
import { ENV_KEYS } from './constants';

export interface ErrorContext {
  operation: string;
  suggestion?: string;
}

export class ErrorHandler {
  static handle(error: unknown, context: ErrorContext): void {
    const errorMessage = this.getErrorMessage(error);
    const userFriendlyMessage = this.getUserFriendlyMessage(error, errorMessage, context);

    console.error(chalk.red('❌ ' + userFriendlyMessage));

    const suggestion = context.suggestion ?? (error instanceof CommitGenError ? error.suggestion : undefined);
    if (suggestion) {
      console.log(chalk.gray('💡 ' + suggestion));
    }

    // Only output the original error in debug mode
    if (process.env[ENV_KEYS.DEBUG] === 'true') {
      console.error(chalk.gray('\n[Debug] Original error:'));
      console.error(error);
    }
  }

  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static getUserFriendlyMessage(error: unknown, errorMessage: string, context: ErrorContext): string {
    // Our own errors already carry a readable message
    if (error instanceof ConfigError) {
      return `Configuration error: ${errorMessage}`;
    }

    if (error instanceof ProviderError) {
      return `Completion request failed: ${errorMessage}`;
    }

    if (error instanceof CommitGenError) {
      return errorMessage;
    }

    if (errorMessage.includes('ENOENT')) {
      return `File not found during ${context.operation}`;
    }

    if (errorMessage.includes('EACCES') || errorMessage.includes('Permission denied')) {
      return `Permission denied during ${context.operation}`;
    }

    return `Error during ${context.operation}: ${errorMessage}`;
  }
}
