/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createPatternsCommand } from './commands/patterns.js';
import { createErrorsCommand } from './commands/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('surveyor')
    .description('Survey source packages for code patterns and compiler diagnostics')
    .version(readVersion());
  [createPatternsCommand, createErrorsCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
