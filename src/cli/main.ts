#!/usr/bin/env node

/**
 * matrixprobe CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('matrixprobe')
  .description(
    'Scrape a listing, translate its headlines and count repeated words, identically across a matrix of local or remote browsers.',
  )
  .version('0.1.0');

registerRunCommand(program);

await program.parseAsync();
