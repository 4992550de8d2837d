#!/usr/bin/env node
/**
 * stratum CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { closeLogger } from '../core/logger.js';
import { createTypeRegistry } from '../core/parameters/registry.js';
import { createEchoCommand } from './commands/echo.js';
import { createEnvCommand } from './commands/env.js';
import { createFilesCommand } from './commands/files.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { cliError } from './renderers/index.js';
import { initCommandLogger, registerCommand } from './run.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/index.ts and dist/cli/index.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();
program
  .name('stratum')
  .description('Layered parameters and row output for command-line tools')
  .version(getPackageVersion())
  .option('--json', 'Print errors as JSON')
  .option('--human', 'Print errors as text');

const registry = createTypeRegistry();
registerCommand(program, createFilesCommand(registry));
registerCommand(program, createEnvCommand(registry));
registerCommand(program, createEchoCommand(registry));

// Error format first, so a failing logger setup is reported in it.
program.hook('preAction', (thisCommand) => {
  setFormatContext(resolveFormat(thisCommand.opts()));
});

program.hook('preAction', async (_thisCommand, actionCommand) => {
  await initCommandLogger(actionCommand);
});

try {
  await program.parseAsync();
} catch (err) {
  process.exitCode = cliError(err);
} finally {
  closeLogger();
}
