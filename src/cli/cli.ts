#!/usr/bin/env node

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Command } from 'commander';
import { registerScanCommand } from './commands/scan/index.js';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);

const program = new Command();

program
  .name('zipsplit')
  .description('Compress and split large files into .dir chunk directories, or recover them')
  .version(packageJson.version);

registerScanCommand(program, process.argv[1] ? resolve(process.argv[1]) : undefined);

await program.parseAsync();
