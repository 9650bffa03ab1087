import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface LoginOptions extends BaseCommandOptions {
  username?: string;
  password?: string;
}

export interface LogoutOptions extends BaseCommandOptions {}

/**
 * SessionCommand - `pkgdb login` and `pkgdb logout`
 */
export class SessionCommand extends BaseCommand {

  register(program: Command): void {
    // pkgdb login -u alice -p ...
    program
      .command('login')
      .description('Log in and store the session cookie for later commands')
      .option('-u, --username <username>', 'Username (default: configured username)')
      .option('-p, --password <password>', 'Password (default: $PKGDB_PASSWORD)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: LoginOptions) => {
        await this.executeLogin(options);
      });

    // pkgdb logout
    program
      .command('logout')
      .description('End the current session on the server')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: LogoutOptions) => {
        await this.executeLogout(options);
      });
  }

  async executeLogin(options: LoginOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB({
        username: options.username,
        password: options.password,
      });
      const credential = await pkgdb.authenticate(true);
      const cookies = credential.cookieNames();

      this.handleSuccess(
        { username: pkgdb.username, cookies },
        options,
        `Logged in as ${pkgdb.username}`,
        `   Session cookies: ${cookies.join(', ')}`
      );
    } catch (error) {
      this.handleFailure('log in', error, options);
    }
  }

  async executeLogout(options: LogoutOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      await pkgdb.logout();

      this.handleSuccess({ loggedOut: true }, options, 'Logged out', null);
    } catch (error) {
      this.handleFailure('log out', error, options);
    }
  }
}
