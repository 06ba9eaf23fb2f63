#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { start } from './commands/start';
import { status } from './commands/status';
import { reset } from './commands/reset';
import { createContext } from './context';
import { exitWithError } from './utils/errors';
import { InquirerUI } from './utils/interactive';
import { resolveSettings } from './utils/settings';

// Package metadata
const packageJson: { version: string } = fs.readJsonSync(path.join(__dirname, '../package.json'));

const ui = new InquirerUI();
const context = createContext(process.cwd(), os.homedir(), resolveSettings(process.env));

const program = new Command();

program.name('gitput').description('Interactive assistant for everyday Git and GitHub workflows').version(packageJson.version);

// Default command: the interactive workflow
program
  .command('start', { isDefault: true })
  .description('Run the interactive workflow (init, connect, commit, push)')
  .action(() => start(context, ui));

program
  .command('status')
  .description('Show the saved GitHub identity')
  .action(() => status(context.store, ui));

program
  .command('reset')
  .description('Delete the saved GitHub credentials')
  .action(() => reset(context.store, ui));

program
  .command('version')
  .description('Print the gitput version')
  .action(() => ui.display(packageJson.version));

program.parseAsync(process.argv).catch((error: unknown) => exitWithError(ui, error));
