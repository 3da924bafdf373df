#!/usr/bin/env node

/**
 * agentwire CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerValidateCommand } from './run.js';

const program = new Command();

program
  .name('agentwire')
  .description(
    'Run multi-agent workflows: sequential pipelines, parallel fan-out and agents calling agents as tools.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerValidateCommand(program);

await program.parseAsync();
