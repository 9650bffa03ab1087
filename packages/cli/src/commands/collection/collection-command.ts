import type { Command } from 'commander';
import type { JsonValue } from '@pkgdb-client/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface CollectionListOptions extends BaseCommandOptions {
  /** false when --no-eol is given */
  eol?: boolean;
}

export interface CollectionCritpathOptions extends BaseCommandOptions {
  collection?: string[];
}

/**
 * Renders `{ "F-13": ["bash", "glibc"] }` as one line per collection.
 */
function describeCritpath(pkgs: JsonValue): string {
  if (typeof pkgs !== 'object' || pkgs === null || Array.isArray(pkgs)) {
    return JSON.stringify(pkgs, null, 2);
  }
  return Object.entries(pkgs)
    .map(([collection, names]) => `${collection}: ${Array.isArray(names) ? names.join(' ') : JSON.stringify(names)}`)
    .join('\n');
}

/**
 * CollectionCommand - release collections and the critical path
 */
export class CollectionCommand extends BaseCommand {

  register(program: Command): void {
    const collection = program
      .command('collection')
      .description('Query release collections')
      .alias('c');

    // pkgdb collection list --no-eol
    collection
      .command('list')
      .description('List collections')
      .alias('ls')
      .option('--no-eol', 'Hide end-of-life collections')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: CollectionListOptions) => {
        await this.executeList(options);
      });

    // pkgdb collection critpath --collection F-13 devel
    collection
      .command('critpath')
      .description('List critical path packages')
      .option('--collection <shortname...>', 'Only these collections (default: all active ones)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: CollectionCritpathOptions) => {
        await this.executeCritpath(options);
      });
  }

  async executeList(options: CollectionListOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const entries = await pkgdb.getCollectionList(options.eol !== false);
      const collections = entries.map(([entry]) => entry);

      this.handleSuccess(
        collections,
        options,
        `${collections.length} collections`,
        collections.map((c) => `${c.branchname}\t${c.name} ${c.version}`).join('\n')
      );
    } catch (error) {
      this.handleFailure('list collections', error, options);
    }
  }

  async executeCritpath(options: CollectionCritpathOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const pkgs = await pkgdb.getCritpathPkgs(options.collection);

      this.handleSuccess(pkgs, options, 'Critical path packages', describeCritpath(pkgs));
    } catch (error) {
      this.handleFailure('get critical path packages', error, options);
    }
  }
}
