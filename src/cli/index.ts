#!/usr/bin/env node
import dotenv from 'dotenv';
import { Command, CommanderError } from 'commander';
import { createInitCommand } from './commands/init';
import { createMembersCommand } from './commands/members';
import { createSearchCommand } from './commands/search';

// Load DROPBOX_ACCESS_TOKEN and friends from .env in the working directory
dotenv.config();

const program = new Command();

program
  .name('dbx-team-search')
  .description('Search and download files across every member account of a Dropbox team')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createMembersCommand());
program.addCommand(createSearchCommand());

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  // Help and version output also surface as exits through exitOverride
  if (error instanceof CommanderError && error.exitCode === 0) {
    return;
  }
  console.error('❌ Command failed:', String(error));
  process.exit(1);
});
