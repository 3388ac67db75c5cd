import * as fs from 'fs';
import * as path from 'path';
import { isOutputFormat, type OutputFormat } from './generator';

/**
 * Configuration schema for cfg-prune
 */
export interface CfgPruneConfig {
  /**
   * Output format
   * @default "text"
   */
  format?: OutputFormat;

  /**
   * Accept TypeScript syntax in input files
   * @default true
   */
  typescript?: boolean;

  /**
   * Accept JSX syntax in input files
   * @default false
   */
  jsx?: boolean;

  /**
   * Only output these functions; empty means all of them
   * @example ["main", "helper"]
   */
  functions?: string[];
}

export const CONFIG_FILES = [
  'cfgprune.config.json',
  '.cfgprunerc',
  '.cfgprunerc.json',
  'cfgprune.config.js',
];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Required<CfgPruneConfig> = {
  format: 'text',
  typescript: true,
  jsx: false,
  functions: [],
};

/**
 * Result of loading config
 */
export interface LoadConfigResult {
  config: Required<CfgPruneConfig>;
  configPath: string | null;
  /** Problems found in the config file; the affected keys fall back to defaults */
  warnings: string[];
}

/**
 * Load configuration from the nearest config file
 * @param startDir Directory to start searching from
 */
export function loadConfig(startDir: string): Required<CfgPruneConfig> {
  return loadConfigWithInfo(startDir).config;
}

/**
 * Load configuration and report where it came from
 * @param startDir Directory to start searching from
 */
export function loadConfigWithInfo(startDir: string): LoadConfigResult {
  const configPath = findConfigFile(startDir);
  const warnings: string[] = [];
  let userConfig: CfgPruneConfig = {};

  if (configPath) {
    try {
      userConfig = validateConfig(loadConfigFile(configPath), warnings);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warnings.push(`Could not load config from ${configPath}: ${reason}`);
    }
  }

  return {
    config: mergeConfig(DEFAULT_CONFIG, userConfig),
    configPath,
    warnings,
  };
}

/**
 * Find the nearest config file by walking up the directory tree
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);

  for (;;) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(dir, configFile);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Load a config file without checking its contents
 */
function loadConfigFile(configPath: string): unknown {
  const ext = path.extname(configPath);

  if (ext === '.json' || path.basename(configPath) === '.cfgprunerc') {
    const content = fs.readFileSync(configPath, 'utf-8');
    return JSON.parse(content);
  }

  if (ext === '.js') {
    // CommonJS config files only
    const loaded: unknown = require(configPath);
    if (isRecord(loaded) && 'default' in loaded) {
      return loaded.default;
    }
    return loaded;
  }

  throw new Error(`Unsupported config file format: ${ext}`);
}

/**
 * Keep the keys that hold valid values; record a warning for the rest.
 */
export function validateConfig(raw: unknown, warnings: string[] = []): CfgPruneConfig {
  if (!isRecord(raw)) {
    warnings.push('Config file must contain an object');
    return {};
  }

  const config: CfgPruneConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'format':
        if (isOutputFormat(value)) {
          config.format = value;
        } else {
          warnings.push(`Invalid format ${JSON.stringify(value)}; expected text, dot or json`);
        }
        break;
      case 'typescript':
      case 'jsx':
        if (typeof value === 'boolean') {
          config[key] = value;
        } else {
          warnings.push(`Invalid ${key} ${JSON.stringify(value)}; expected true or false`);
        }
        break;
      case 'functions':
        if (Array.isArray(value) && value.every((name) => typeof name === 'string')) {
          config.functions = value.filter((name): name is string => typeof name === 'string');
        } else {
          warnings.push('Invalid functions; expected a list of function names');
        }
        break;
      default:
        warnings.push(`Unknown config key "${key}"`);
    }
  }

  return config;
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(
  defaults: Required<CfgPruneConfig>,
  userConfig: Partial<CfgPruneConfig>
): Required<CfgPruneConfig> {
  return {
    format: userConfig.format ?? defaults.format,
    typescript: userConfig.typescript ?? defaults.typescript,
    jsx: userConfig.jsx ?? defaults.jsx,
    functions: userConfig.functions ?? [...defaults.functions],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
