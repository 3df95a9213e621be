#!/usr/bin/env node
import { Command } from 'commander';
import { registerInspect } from './commands/inspect.js';
import { registerTree } from './commands/tree.js';
import { registerCheck } from './commands/check.js';

export const program = new Command();

program
  .name('dotlex')
  .description('Inspect and check table and JSON translation files')
  .version('0.1.0');

registerInspect(program);
registerTree(program);
registerCheck(program);

program.parse();
