#!/usr/bin/env node

/**
 * testbridge CLI - plan Xray test-record migrations between Jira instances
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerDatasetsCommand } from './commands/datasets.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerPlanCommand } from './commands/plan.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('testbridge')
  .description('Reconcile Xray test records with a target Jira instance and build import batches')
  .version(pkg.version);

registerInspectCommand(program);
registerPlanCommand(program);
registerDatasetsCommand(program);

program.parse();
