import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';
import { createServeCommand } from './commands/serve.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('target-sense')
    .description('Validate and explore _target_ references in YAML configuration')
    .version(VERSION);
  [createServeCommand, createCheckCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
