#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION } from '@pkgdb-client/core';
import { SessionCommand } from './commands/session/session-command';
import { PackageCommand } from './commands/package/package-command';
import { CollectionCommand } from './commands/collection/collection-command';

const program = new Command();

program
  .name('pkgdb')
  .description('Command-line client for the package database')
  .version(VERSION);

new SessionCommand().register(program);
new PackageCommand().register(program);
new CollectionCommand().register(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
