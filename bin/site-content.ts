#!/usr/bin/env tsx
/**
 * Site Content CLI Entry Point
 *
 * Validates the spreadsheet-maintained site tables and publishes the
 * nested content document the app bundles.
 *
 * @module site-content-cli
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import {
  EXIT_CODES,
  initializeContext,
  type ContextOptions,
} from '../src/cli/lib/context.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/context.js';

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Read the version from the nearest package.json (source or dist layout)
 */
function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let depth = 0; depth < 3; depth++) {
    const packageJsonPath = join(dir, 'package.json');
    if (existsSync(packageJsonPath)) {
      try {
        const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (
          typeof packageJson === 'object' &&
          packageJson !== null &&
          'version' in packageJson &&
          typeof packageJson.version === 'string'
        ) {
          return packageJson.version;
        }
      } catch {
        return '0.0.0';
      }
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('site-content')
    .description('Validate site content tables and publish the app content document')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .site-contentrc)')
    .hook('preAction', (_thisCommand, actionCommand) => {
      try {
        initializeContext(actionCommand.optsWithGlobals<ContextOptions>());
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.VALIDATION_ERRORS);
});
