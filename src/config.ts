/**
 * Configuration parsing, defaults and resolution
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { InvalidConfigurationError, errorMessage } from './errors';
import type { PartialRunConfiguration, RunConfiguration, ToolName } from './types';

/**
 * Configuration file looked up when no path is given
 */
export const DEFAULT_CONFIG_PATH = '.terraform-checks.yaml';

/**
 * Declared defaults for every configuration field
 */
export const DEFAULT_CONFIGURATION: RunConfiguration = Object.freeze<RunConfiguration>({
  runnerLabel: 'ubuntu-latest',
  workingDirectory: '.',
  // Empty: follow workingDirectory
  validateDirectory: '',
  tool: 'terraform',
  toolVersion: '',
  tflintVersion: 'latest',
  terraformDocsVersion: 'v0.19.0',
  enableSecurityScan: false,
  securitySoftFail: false,
  enableDocs: false,
  docsOutputFile: 'README.md',
  allowedPrAuthor: '',
  mainBranch: 'main',
  enableDependencyUpdates: false,
  renovateConfigFile: 'renovate.json',
  renovateDebug: false,
  stepTimeoutMinutes: 15,
  uploadReport: true,
});

/**
 * Longest step timeout a Node.js timer can hold (2^31-1 ms)
 */
export const MAX_STEP_TIMEOUT_MINUTES = Math.floor(2147483647 / 60000);

const VALID_TOOLS: ToolName[] = ['terraform', 'opentofu'];

/**
 * Validates a tool name
 */
export function parseToolName(value: string, source: string): ToolName {
  const tool = VALID_TOOLS.find((candidate) => candidate === value);
  if (!tool) {
    throw new InvalidConfigurationError(
      `Invalid ${source}: ${value}. Must be one of: ${VALID_TOOLS.join(', ')}`
    );
  }
  return tool;
}

/**
 * Validates that a path is relative and stays inside the repository root once
 * joined to the directory it is relative to
 */
function validateRelativePath(value: string, fieldName: string, baseDirectory = '.'): void {
  if (value.trim() === '') {
    throw new InvalidConfigurationError(`${fieldName} must not be empty`);
  }

  if (path.posix.isAbsolute(value) || path.win32.isAbsolute(value)) {
    throw new InvalidConfigurationError(`${fieldName} must be a relative path: ${value}`);
  }

  const resolved = path.posix.join(baseDirectory, value.replace(/\\/g, '/'));
  if (resolved === '..' || resolved.startsWith('../')) {
    throw new InvalidConfigurationError(
      `${fieldName} points outside the repository root: ${value}`
    );
  }
}

function pickString(value: string | undefined, fallback: string): string {
  return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
}

/**
 * Merges caller-supplied configuration over the declared defaults
 *
 * @param partial - Caller values; missing or empty values fall back to defaults
 * @param defaults - Default table
 * @returns Frozen run configuration
 * @throws InvalidConfigurationError if a path escapes the repository or the timeout is out of range
 *
 * @remarks
 * Pure: the same input always yields an equal configuration.
 */
export function resolveConfiguration(
  partial: PartialRunConfiguration,
  defaults: RunConfiguration = DEFAULT_CONFIGURATION
): RunConfiguration {
  const workingDirectory = pickString(partial.workingDirectory, defaults.workingDirectory);
  const validateDirectory = pickString(
    partial.validateDirectory,
    pickString(defaults.validateDirectory, workingDirectory)
  );
  const docsOutputFile = pickString(partial.docsOutputFile, defaults.docsOutputFile);
  const renovateConfigFile = pickString(partial.renovateConfigFile, defaults.renovateConfigFile);

  validateRelativePath(workingDirectory, 'working directory');
  validateRelativePath(validateDirectory, 'validate directory');
  validateRelativePath(docsOutputFile, 'docs output file', workingDirectory);
  validateRelativePath(renovateConfigFile, 'renovate config file');

  const stepTimeoutMinutes = partial.stepTimeoutMinutes ?? defaults.stepTimeoutMinutes;
  if (!Number.isFinite(stepTimeoutMinutes) || stepTimeoutMinutes <= 0) {
    throw new InvalidConfigurationError(
      `step timeout must be a positive number of minutes, got ${stepTimeoutMinutes}`
    );
  }
  if (stepTimeoutMinutes > MAX_STEP_TIMEOUT_MINUTES) {
    throw new InvalidConfigurationError(
      `step timeout must not exceed ${MAX_STEP_TIMEOUT_MINUTES} minutes, got ${stepTimeoutMinutes}`
    );
  }

  return Object.freeze({
    runnerLabel: pickString(partial.runnerLabel, defaults.runnerLabel),
    workingDirectory,
    validateDirectory,
    tool: partial.tool ?? defaults.tool,
    toolVersion: pickString(partial.toolVersion, defaults.toolVersion),
    tflintVersion: pickString(partial.tflintVersion, defaults.tflintVersion),
    terraformDocsVersion: pickString(partial.terraformDocsVersion, defaults.terraformDocsVersion),
    enableSecurityScan: partial.enableSecurityScan ?? defaults.enableSecurityScan,
    securitySoftFail: partial.securitySoftFail ?? defaults.securitySoftFail,
    enableDocs: partial.enableDocs ?? defaults.enableDocs,
    docsOutputFile,
    allowedPrAuthor: pickString(partial.allowedPrAuthor, defaults.allowedPrAuthor),
    mainBranch: pickString(partial.mainBranch, defaults.mainBranch),
    enableDependencyUpdates: partial.enableDependencyUpdates ?? defaults.enableDependencyUpdates,
    renovateConfigFile,
    renovateDebug: partial.renovateDebug ?? defaults.renovateDebug,
    stepTimeoutMinutes,
    uploadReport: partial.uploadReport ?? defaults.uploadReport,
  });
}

type StringField = Exclude<
  { [K in keyof RunConfiguration]: RunConfiguration[K] extends string ? K : never }[keyof RunConfiguration],
  'tool'
>;

type BooleanField = {
  [K in keyof RunConfiguration]: RunConfiguration[K] extends boolean ? K : never;
}[keyof RunConfiguration];

/**
 * String settings and their external names (kebab-case inputs, snake_case in YAML)
 */
export const STRING_FIELDS: ReadonlyArray<readonly [StringField, string]> = [
  ['runnerLabel', 'runner-label'],
  ['workingDirectory', 'working-directory'],
  ['validateDirectory', 'validate-directory'],
  ['toolVersion', 'tool-version'],
  ['tflintVersion', 'tflint-version'],
  ['terraformDocsVersion', 'terraform-docs-version'],
  ['docsOutputFile', 'docs-output-file'],
  ['allowedPrAuthor', 'allowed-pr-author'],
  ['mainBranch', 'main-branch'],
  ['renovateConfigFile', 'renovate-config-file'],
];

/**
 * Boolean settings and their external names
 */
export const BOOLEAN_FIELDS: ReadonlyArray<readonly [BooleanField, string]> = [
  ['enableSecurityScan', 'enable-security-scan'],
  ['securitySoftFail', 'security-soft-fail'],
  ['enableDocs', 'enable-docs'],
  ['enableDependencyUpdates', 'enable-dependency-updates'],
  ['renovateDebug', 'renovate-debug'],
  ['uploadReport', 'upload-report'],
];

function snakeCase(name: string): string {
  return name.replace(/-/g, '_');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the parsed configuration file contents
 */
function validateConfigFile(config: unknown): PartialRunConfiguration {
  // An empty YAML document parses to undefined
  if (config === undefined || config === null) {
    return {};
  }

  if (!isRecord(config)) {
    throw new InvalidConfigurationError('Configuration must be an object');
  }

  const partial: PartialRunConfiguration = {};

  for (const [field, name] of STRING_FIELDS) {
    const key = snakeCase(name);
    const value = config[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new InvalidConfigurationError(`${key} must be a string`);
    }
    partial[field] = value;
  }

  for (const [field, name] of BOOLEAN_FIELDS) {
    const key = snakeCase(name);
    const value = config[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'boolean') {
      throw new InvalidConfigurationError(`${key} must be a boolean`);
    }
    partial[field] = value;
  }

  if (config.tool !== undefined && config.tool !== null) {
    if (typeof config.tool !== 'string') {
      throw new InvalidConfigurationError('tool must be a string');
    }
    partial.tool = parseToolName(config.tool, 'tool');
  }

  const timeout = config.step_timeout_minutes;
  if (timeout !== undefined && timeout !== null) {
    if (typeof timeout !== 'number') {
      throw new InvalidConfigurationError('step_timeout_minutes must be a number');
    }
    partial.stepTimeoutMinutes = timeout;
  }

  return partial;
}

/**
 * Loads and parses the configuration file
 *
 * @param configPath - Path to the YAML configuration file
 * @param required - Whether a missing file is an error
 * @returns Partial configuration (empty when an optional file is missing)
 * @throws InvalidConfigurationError if the file is missing (when required), unreadable, invalid YAML, or fails validation
 */
export function loadConfigFile(configPath: string, required = true): PartialRunConfiguration {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    if (required) {
      throw new InvalidConfigurationError(`Configuration file not found: ${absolutePath}`);
    }
    return {};
  }

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new InvalidConfigurationError(
      `Failed to read configuration file: ${errorMessage(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidConfigurationError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  return validateConfigFile(parsed);
}
