#!/usr/bin/env node

import { Command } from 'commander';
import { gettingStartedCommand } from './commands/getting-started.js';
import { opsCommand } from './commands/ops.js';
import { createRunCommand } from './commands/run.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('textkit')
  .description('Text transformations and identifier case conversion')
  .version(VERSION)
  .addHelpText(
    'after',
    `
Quick Start:
  $ textkit getting-started                       # Usage guide
  $ textkit ops list                              # Available operations
  $ textkit run convert-case --text "myVar" --style snake_case
`,
  );

program.addCommand(gettingStartedCommand);
opsCommand(program);
program.addCommand(createRunCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed') {
    process.exit(0);
  }
  if (err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(1);
});

await program.parseAsync();
