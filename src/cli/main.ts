#!/usr/bin/env node

/**
 * plangraph CLI: `validate` checks a plan library, `simulate` replays a
 * scripted session through the engine.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerValidateCommand, registerSimulateCommand } from './run.js';

const program = new Command();

program
  .name('plangraph')
  .description(
    'Graph workflow engine for conversational agents. Validate plan libraries and replay scripted sessions through the engine.',
  )
  .version('0.1.0');

registerValidateCommand(program);
registerSimulateCommand(program);

program.parse();
