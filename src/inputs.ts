/**
 * Action inputs
 */

import * as core from '@actions/core';
import {
  BOOLEAN_FIELDS,
  DEFAULT_CONFIG_PATH,
  STRING_FIELDS,
  loadConfigFile,
  parseToolName,
  resolveConfiguration,
} from './config';
import { InvalidConfigurationError, errorMessage } from './errors';
import type { PartialRunConfiguration, RunConfiguration } from './types';

/**
 * Reads the configuration inputs that were set
 *
 * @returns Partial configuration holding only non-empty inputs
 * @throws InvalidConfigurationError if a boolean, number or tool input is malformed
 *
 * @remarks
 * action.yml declares no defaults for these inputs, so an empty input means
 * "not set" and the config file or the built-in default applies.
 */
export function readInputs(): PartialRunConfiguration {
  const partial: PartialRunConfiguration = {};

  for (const [field, name] of STRING_FIELDS) {
    const value = core.getInput(name);
    if (value !== '') {
      partial[field] = value;
    }
  }

  for (const [field, name] of BOOLEAN_FIELDS) {
    if (core.getInput(name) === '') {
      continue;
    }
    try {
      partial[field] = core.getBooleanInput(name);
    } catch (error) {
      throw new InvalidConfigurationError(errorMessage(error));
    }
  }

  const tool = core.getInput('tool');
  if (tool !== '') {
    partial.tool = parseToolName(tool, 'input tool');
  }

  const timeout = core.getInput('step-timeout-minutes');
  if (timeout !== '') {
    const minutes = Number(timeout);
    if (Number.isNaN(minutes)) {
      throw new InvalidConfigurationError(`Input step-timeout-minutes must be a number: ${timeout}`);
    }
    partial.stepTimeoutMinutes = minutes;
  }

  return partial;
}

/**
 * Loads the run configuration: defaults, then the config file, then inputs
 *
 * @throws InvalidConfigurationError if any source is invalid
 */
export function loadRunConfiguration(): RunConfiguration {
  const configPath = core.getInput('config-path');
  const fromFile = loadConfigFile(configPath || DEFAULT_CONFIG_PATH, configPath !== '');
  const fromInputs = readInputs();

  return resolveConfiguration({ ...fromFile, ...fromInputs });
}
