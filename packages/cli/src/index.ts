#!/usr/bin/env node
import { Command } from 'commander';
import { registerInit } from './commands/init.js';
import { registerCheck } from './commands/check.js';
import { registerBaseline } from './commands/baseline.js';
import { registerFix } from './commands/fix.js';
import { registerClean } from './commands/clean.js';

export const program = new Command();

program
  .name('glot')
  .description('Static i18n checker for next-intl style React projects')
  .version('0.4.0');

registerInit(program);
registerCheck(program);
registerBaseline(program);
registerFix(program);
registerClean(program);

await program.parseAsync(process.argv);
