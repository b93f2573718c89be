#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { registerDeployCommand } from './commands/deploy/index.js';
import { registerTestCommand } from './commands/test/index.js';

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

const program = new Command();

program
  .name('metadeploy')
  .description('Deploy Salesforce metadata and run Apex tests through the sf CLI')
  .version(packageJson.version);

// Register all commands
registerDeployCommand(program);
registerTestCommand(program);

await program.parseAsync();
