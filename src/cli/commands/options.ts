/**
 * Option argument parsers shared by the commands
 *
 * Commander reports a thrown InvalidArgumentError as a usage error.
 */

import { InvalidArgumentError } from 'commander';

import type { SourceKind } from '../lib/config.js';
import type { OutputFormat } from '../lib/validation-report.js';

export function parseSourceKind(value: string): SourceKind {
  if (value !== 'local' && value !== 'remote') {
    throw new InvalidArgumentError('Must be local or remote.');
  }
  return value;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('Must be text or json.');
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
