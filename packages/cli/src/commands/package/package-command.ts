import type { Command } from 'commander';
import { PACKAGE_ACLS } from '@pkgdb-client/core';
import type { JsonValue, PackageAcl } from '@pkgdb-client/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface PackageInfoOptions extends BaseCommandOptions {
  branch?: string;
}

export interface PackageOwnersOptions extends BaseCommandOptions {
  collection?: string;
  collectionVersion?: string;
}

export interface PackageListOptions extends BaseCommandOptions {
  collection?: string;
}

export interface PackageOrphansOptions extends BaseCommandOptions {}

export interface PackageUserOptions extends BaseCommandOptions {
  acl?: string[];
  eol?: boolean;
}

function isPackageAcl(value: string): value is PackageAcl {
  return PACKAGE_ACLS.some((acl) => acl === value);
}

function describePackage(pkg: JsonValue): string {
  if (typeof pkg === 'object' && pkg !== null && !Array.isArray(pkg)) {
    const name = pkg['name'];
    if (typeof name === 'string') {
      return name;
    }
  }
  return JSON.stringify(pkg);
}

/**
 * PackageCommand - read-only package queries
 */
export class PackageCommand extends BaseCommand {

  register(program: Command): void {
    const pkg = program
      .command('package')
      .description('Query package ownership and listings')
      .alias('p');

    // pkgdb package info bash -b F-13
    pkg
      .command('info <name>')
      .description('Show ownership information for a package')
      .option('-b, --branch <branch>', 'Restrict to one branch (e.g. devel, F-13, EL-5)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (name: string, options: PackageInfoOptions) => {
        await this.executeInfo(name, options);
      });

    // pkgdb package owners bash --collection Fedora --collection-version devel
    pkg
      .command('owners <name>')
      .description('Show the owners of a package')
      .option('--collection <name>', "Collection name (e.g. 'Fedora', 'Fedora EPEL')")
      .option('--collection-version <version>', 'Collection version (needs --collection)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (name: string, options: PackageOwnersOptions) => {
        await this.executeOwners(name, options);
      });

    // pkgdb package list --collection F-13
    pkg
      .command('list')
      .description('List package names')
      .alias('ls')
      .option('--collection <shortname>', 'Only packages in this collection (e.g. devel, F-13)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: PackageListOptions) => {
        await this.executeList(options);
      });

    // pkgdb package orphans
    pkg
      .command('orphans')
      .description('List packages orphaned in any active release')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: PackageOrphansOptions) => {
        await this.executeOrphans(options);
      });

    // pkgdb package user alice --acl owner commit
    pkg
      .command('user <username>')
      .description('List the packages a user holds ACLs on')
      .option('--acl <acl...>', `Only these ACLs (${PACKAGE_ACLS.join(', ')})`)
      .option('--eol', 'Include end-of-life releases')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (username: string, options: PackageUserOptions) => {
        await this.executeUser(username, options);
      });
  }

  async executeInfo(name: string, options: PackageInfoOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const info = await pkgdb.getPackageInfo(name, options.branch);

      this.handleSuccess(info, options, options.branch ? `${name} (${options.branch})` : name);
    } catch (error) {
      this.handleFailure(`get package info for ${name}`, error, options);
    }
  }

  async executeOwners(name: string, options: PackageOwnersOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const owners = await pkgdb.getOwners(name, options.collection, options.collectionVersion);

      this.handleSuccess(owners, options, `Owners of ${name}`);
    } catch (error) {
      this.handleFailure(`get owners for ${name}`, error, options);
    }
  }

  async executeList(options: PackageListOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const names = await pkgdb.getPackageList(options.collection);

      this.handleSuccess(names, options, `${names.length} packages`, names.join('\n'));
    } catch (error) {
      this.handleFailure('list packages', error, options);
    }
  }

  async executeOrphans(options: PackageOrphansOptions): Promise<void> {
    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const orphans = await pkgdb.orphanPackages();

      this.handleSuccess(orphans, options, `${orphans.length} orphaned packages`, orphans.map(describePackage).join('\n'));
    } catch (error) {
      this.handleFailure('list orphaned packages', error, options);
    }
  }

  async executeUser(username: string, options: PackageUserOptions): Promise<void> {
    const requested = options.acl ?? [];
    const unknown = requested.filter((acl) => !isPackageAcl(acl));
    if (unknown.length > 0) {
      this.handleError(`Unknown ACL: ${unknown.join(', ')}. Use ${PACKAGE_ACLS.join(', ')}`, options);
      return;
    }

    try {
      const pkgdb = await this.dependencyService.getPackageDB();
      const packages = await pkgdb.userPackages(username, requested.filter(isPackageAcl), options.eol ?? false);

      this.handleSuccess(packages, options, `Packages for ${username}`);
    } catch (error) {
      this.handleFailure(`list packages for ${username}`, error, options);
    }
  }
}
