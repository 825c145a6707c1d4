/**
 * Commands Index
 *
 * Registers every subcommand:
 * - validate: Validate tables and print the report
 * - sync: Validate and write the content document
 * - template: Write header-only table CSVs
 */

import type { Command } from 'commander';
import { registerValidateCommand } from './validate.js';
import { registerSyncCommand } from './sync.js';
import { registerTemplateCommand } from './template.js';

/**
 * Register all subcommands
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerValidateCommand(program);
  registerSyncCommand(program);
  registerTemplateCommand(program);
}
