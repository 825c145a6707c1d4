/**
 * Site Content CLI Configuration Management
 *
 * Loads configuration from .site-contentrc (YAML or JSON) with environment
 * variable overrides and defaults. Provides the typed configuration used
 * by every command.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SITE_CONTENT_*)
 * 3. Config file (.site-contentrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { createContentRules, type ContentRules } from '../../core/config.js';
import type { TableName } from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type SourceKind = 'local' | 'remote';

export interface PathsConfig {
  /** Directory holding the five table CSV files */
  readonly data: string;
  /** Every path the document is written to */
  readonly outputs: readonly string[];
}

export interface SourceConfig {
  readonly kind: SourceKind;
  readonly spreadsheetId: string | null;
  /** Tab id (gid) per table, required for the remote source */
  readonly sheets: Readonly<Record<TableName, number>> | null;
  /** Fetch timeout in milliseconds */
  readonly timeout: number;
}

export interface ProbeConfig {
  readonly enabled: boolean;
  /** Per-URL timeout in milliseconds */
  readonly timeout: number;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly source: SourceConfig;
  readonly probe: ProbeConfig;
  readonly rules: ContentRules;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const SheetsSchema = z.object({
  Sites: z.number().int().nonnegative(),
  SubLocations: z.number().int().nonnegative(),
  Cards: z.number().int().nonnegative(),
  Tips: z.number().int().nonnegative(),
  ArabicPhrases: z.number().int().nonnegative(),
});

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        data: z.string().optional(),
        outputs: z.array(z.string()).min(1).optional(),
      })
      .optional(),
    source: z
      .object({
        kind: z.enum(['local', 'remote']).optional(),
        spreadsheetId: z.string().optional(),
        sheets: SheetsSchema.optional(),
        timeout: z.number().int().positive().optional(),
      })
      .optional(),
    probe: z
      .object({
        enabled: z.boolean().optional(),
        timeout: z.number().int().positive().optional(),
      })
      .optional(),
    rules: z
      .object({
        lengths: z
          .object({
            shortDescriptionMax: z.number().int().positive().optional(),
            shortDescriptionMin: z.number().int().nonnegative().optional(),
            cardContentMax: z.number().int().positive().optional(),
            cardContentMin: z.number().int().nonnegative().optional(),
            tipMax: z.number().int().positive().optional(),
            tipMin: z.number().int().nonnegative().optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly source: Pick<SourceConfig, 'kind' | 'timeout'>;
  readonly probe: ProbeConfig;
} = {
  version: 1,
  paths: {
    data: './data',
    outputs: ['./content/site_content.json', './Resources/site_content.json'],
  },
  source: {
    kind: 'local',
    timeout: 30000,
  },
  probe: {
    enabled: false,
    timeout: 5000,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.site-contentrc',
  '.site-contentrc.yaml',
  '.site-contentrc.yml',
  '.site-contentrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  // YAML is a superset of JSON
  const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${details}`);
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`SITE_CONTENT_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvSourceKind(env: Env): SourceKind | undefined {
  const value = getEnvVar(env, 'SOURCE');
  if (value === undefined) return undefined;
  if (value !== 'local' && value !== 'remote') {
    throw new Error(`Invalid SITE_CONTENT_SOURCE: ${value}. Must be local or remote`);
  }
  return value;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to search from; defaults to process.cwd() */
  cwd?: string;
  /** Environment; defaults to process.env */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    source?: SourceKind;
    data?: string;
    outputs?: readonly string[];
    checkUrls?: boolean;
    probeTimeout?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Relative paths resolve against the config file's directory, or the
 * working directory when there is no config file.
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (!existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const baseDir = configPath ? dirname(configPath) : cwd;
  // flag and env paths are relative to where the command runs
  const fromCwd = (path: string): string => resolve(cwd, path);
  const fromBase = (path: string): string => resolve(baseDir, path);

  const envOutputs = getEnvVar(env, 'OUTPUTS')
    ?.split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const envData = getEnvVar(env, 'DATA_DIR');
  const data =
    overrides.data !== undefined
      ? fromCwd(overrides.data)
      : envData !== undefined
        ? fromCwd(envData)
        : fromBase(fileConfig.paths?.data ?? DEFAULT_CONFIG.paths.data);

  const fileOutputs: readonly string[] = fileConfig.paths?.outputs ?? DEFAULT_CONFIG.paths.outputs;
  const outputs =
    overrides.outputs !== undefined && overrides.outputs.length > 0
      ? overrides.outputs.map(fromCwd)
      : envOutputs !== undefined && envOutputs.length > 0
        ? envOutputs.map(fromCwd)
        : fileOutputs.map(fromBase);

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,
    paths: { data, outputs },
    source: {
      kind:
        overrides.source ??
        getEnvSourceKind(env) ??
        fileConfig.source?.kind ??
        DEFAULT_CONFIG.source.kind,
      spreadsheetId:
        getEnvVar(env, 'SPREADSHEET_ID') ?? fileConfig.source?.spreadsheetId ?? null,
      sheets: fileConfig.source?.sheets ?? null,
      timeout: fileConfig.source?.timeout ?? DEFAULT_CONFIG.source.timeout,
    },
    probe: {
      enabled:
        overrides.checkUrls ??
        getEnvBool(env, 'CHECK_URLS') ??
        fileConfig.probe?.enabled ??
        DEFAULT_CONFIG.probe.enabled,
      timeout:
        overrides.probeTimeout ??
        getEnvNumber(env, 'PROBE_TIMEOUT') ??
        fileConfig.probe?.timeout ??
        DEFAULT_CONFIG.probe.timeout,
    },
    rules: createContentRules({ lengths: fileConfig.rules?.lengths }),
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.probe.timeout <= 0) {
    throw new Error('Probe timeout must be a positive number');
  }

  if (config.source.kind === 'remote') {
    if (!config.source.spreadsheetId) {
      throw new Error('Remote source requires source.spreadsheetId (or SITE_CONTENT_SPREADSHEET_ID)');
    }
    if (!config.source.sheets) {
      throw new Error('Remote source requires source.sheets with a gid for each table');
    }
  }
}
