/**
 * CLI Global Context
 *
 * Configuration and logger shared by every command, initialised once in
 * the program's preAction hook.
 *
 * @module cli/lib/context
 */

import { ContentValidationError, SourceEmptyError, TableSourceError } from '../../core/errors.js';
import { loadConfig, validateConfig, type CLIConfig, type SourceKind } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  VALIDATION_ERRORS: 2,
  CONFIG_ERROR: 3,
  SOURCE_ERROR: 4,
  EMPTY_SOURCE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ContentValidationError) return EXIT_CODES.VALIDATION_ERRORS;
  if (error instanceof SourceEmptyError) return EXIT_CODES.EMPTY_SOURCE;
  if (error instanceof TableSourceError) return EXIT_CODES.SOURCE_ERROR;
  return EXIT_CODES.VALIDATION_ERRORS;
}

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

/**
 * Options merged from the program and the running subcommand
 */
export type ContextOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  source?: SourceKind;
  data?: string;
  output?: string[];
  checkUrls?: boolean;
  probeTimeout?: number;
};

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Load and validate configuration, then create the CLI logger
 *
 * @throws Error if the config file or flags are invalid
 */
export function initializeContext(options: ContextOptions): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      source: options.source,
      data: options.data,
      outputs: options.output,
      checkUrls: options.checkUrls,
      probeTimeout: options.probeTimeout,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}
