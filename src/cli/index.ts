#!/usr/bin/env node
// Change impact toolkit CLI

import { Command } from 'commander';
import { registerImpactCommands } from './commands/impact.js';
import { registerContractCommands } from './commands/contracts.js';

const program = new Command();

program
  .name('impact')
  .description('Change impact analysis - predict the blast radius of a component change')
  .version('0.1.0');

registerImpactCommands(program);
registerContractCommands(program);

await program.parseAsync();
