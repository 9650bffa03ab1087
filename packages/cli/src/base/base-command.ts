/**
 * Base Command Class for the pkgdb CLI
 *
 * Provides the shared output conventions (--json, --verbose, --quiet) and
 * access to the DependencyInjectionService.
 */

import type { Command } from 'commander';
import { AuthError, errorMessage } from '@pkgdb-client/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand implements ICommand {
  protected readonly dependencyService = DependencyInjectionService.getInstance();

  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: BaseCommandOptions, error?: Error, exitCode: number = 1): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Reports a failed action, pointing at `pkgdb login` when the session is
   * the problem.
   */
  protected handleFailure(action: string, error: unknown, options: BaseCommandOptions): void {
    let message = `Failed to ${action}: ${errorMessage(error)}`;
    if (error instanceof AuthError) {
      message += "\n💡 Run 'pkgdb login' to start a new session.";
    }
    this.handleError(message, options, error instanceof Error ? error : undefined);
  }

  /**
   * Handle successful output consistently. `text` replaces the raw data in
   * human-readable mode; null prints the message alone.
   */
  protected handleSuccess(data: unknown, options: BaseCommandOptions, message?: string, text?: string | null): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (options.quiet) {
      return;
    }
    if (message) {
      console.log(`✅ ${message}`);
    }
    if (typeof text === 'string') {
      console.log(text);
    } else if (text === undefined && data !== undefined && data !== null) {
      console.log(JSON.stringify(data, null, 2));
    }
  }
}
