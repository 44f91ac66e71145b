/**
 * Job catalogue: the checks the pipeline knows how to run
 */

import * as path from 'node:path';
import { dependencyUpdateGate, docsGate, lintGate, securityGate } from './gates';
import { resolveSecretEnv, type SecretStore } from './secrets';
import type {
  ExitCodeConvention,
  ExitCodeMeaning,
  JobSpec,
  RenderedCommand,
  RunConfiguration,
  StepConditionContext,
  StepSpec,
} from './types';

/**
 * Binaries resolved by tool setup
 */
export interface ToolPaths {
  /** terraform or tofu */
  readonly toolBin: string;
  readonly tflintBin: string;
  readonly terraformDocsBin: string;
}

/**
 * Secret name of the Renovate token
 */
export const RENOVATE_TOKEN_SECRET = 'renovate-token';

const DOCS_COMMIT_MESSAGE = 'docs: update terraform documentation';
const BOT_NAME = 'github-actions[bot]';
const BOT_EMAIL = 'github-actions[bot]@users.noreply.github.com';

const PLACEHOLDER_REGEX = /\{\{\s*([A-Za-z]+)\s*\}\}/g;

/**
 * `terraform fmt -check` exits 3 when files need formatting
 */
export const FMT_EXIT_CODES: ExitCodeConvention = {
  0: { status: 'succeeded', outcome: 'formatted' },
  3: { status: 'failed', outcome: 'needs-formatting' },
};

/**
 * TFLint: 0 no issues, 2 errors, 3 issues found
 */
export const TFLINT_EXIT_CODES: ExitCodeConvention = {
  0: { status: 'succeeded', outcome: 'clean' },
  3: { status: 'failed', outcome: 'issues-found' },
};

/**
 * Checkov and TFSec exit 1 when they report findings
 */
export const SCANNER_EXIT_CODES: ExitCodeConvention = {
  0: { status: 'succeeded', outcome: 'clean' },
  1: { status: 'failed', outcome: 'findings' },
};

/**
 * `git diff --quiet` exits 1 when there are changes; both outcomes succeed
 */
export const DIFF_EXIT_CODES: ExitCodeConvention = {
  0: { status: 'succeeded', outcome: 'unchanged' },
  1: { status: 'succeeded', outcome: 'changed' },
};

/**
 * Maps an exit code through a step's convention
 *
 * @remarks
 * Without a convention, 0 succeeds and anything else is a tool-reported failure.
 */
export function interpretExitCode(step: StepSpec, exitCode: number): ExitCodeMeaning {
  if (step.exitCodes) {
    return step.exitCodes[exitCode] ?? { status: 'failed' };
  }
  return { status: exitCode === 0 ? 'succeeded' : 'failed' };
}

/**
 * Builds the placeholder table for step templates
 */
export function templateVariables(
  config: RunConfiguration,
  tools: ToolPaths
): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    variables[key] = String(value);
  }

  variables.docsPath = path.posix.join(config.workingDirectory, config.docsOutputFile);
  variables.toolBin = tools.toolBin;
  variables.tflintBin = tools.tflintBin;
  variables.terraformDocsBin = tools.terraformDocsBin;

  return variables;
}

/**
 * Substitutes `{{name}}` placeholders
 *
 * @throws Error if the template names an unknown variable
 */
export function renderTemplate(template: string, variables: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_REGEX, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw new Error(`Unknown template variable: ${name}`);
    }
    return variables[name];
  });
}

/**
 * Renders a step into a concrete command
 *
 * @param step - Step definition
 * @param variables - Placeholder table
 * @param secrets - Secrets available to the pipeline; only those the step binds are included
 */
export function renderStep(
  step: StepSpec,
  variables: Readonly<Record<string, string>>,
  secrets: SecretStore
): RenderedCommand {
  const [file, ...args] = step.command.map((part) => renderTemplate(part, variables));
  if (!file) {
    throw new Error(`Step ${step.name} has an empty command`);
  }

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(step.env ?? {})) {
    env[key] = renderTemplate(value, variables);
  }

  return {
    file,
    args,
    cwd: renderTemplate(step.cwd, variables),
    env: { ...env, ...resolveSecretEnv(step.secrets, secrets) },
  };
}

function docsChanged({ previous }: StepConditionContext): boolean {
  return previous.find((step) => step.name === 'detect-changes')?.outcome === 'changed';
}

function lintJob(): JobSpec {
  return {
    name: 'lint',
    gate: lintGate,
    steps: [
      {
        name: 'fmt',
        command: ['{{toolBin}}', 'fmt', '-check', '-recursive', '-diff'],
        cwd: '{{workingDirectory}}',
        continueOnFailure: false,
        exitCodes: FMT_EXIT_CODES,
      },
      {
        name: 'init',
        command: ['{{toolBin}}', 'init', '-backend=false', '-input=false'],
        cwd: '{{validateDirectory}}',
        continueOnFailure: false,
      },
      {
        name: 'validate',
        command: ['{{toolBin}}', 'validate', '-no-color'],
        cwd: '{{validateDirectory}}',
        continueOnFailure: false,
      },
      {
        name: 'tflint-init',
        command: ['{{tflintBin}}', '--init'],
        cwd: '{{workingDirectory}}',
        continueOnFailure: false,
      },
      {
        name: 'tflint',
        command: ['{{tflintBin}}', '--recursive', '--format', 'compact'],
        cwd: '{{workingDirectory}}',
        continueOnFailure: false,
        exitCodes: TFLINT_EXIT_CODES,
      },
    ],
  };
}

function securityJob(config: RunConfiguration): JobSpec {
  return {
    name: 'security',
    gate: securityGate,
    steps: [
      {
        name: 'checkov',
        command: ['checkov', '-d', '{{workingDirectory}}', '--quiet', '--compact'],
        cwd: '.',
        continueOnFailure: config.securitySoftFail,
        exitCodes: SCANNER_EXIT_CODES,
      },
      {
        name: 'tfsec',
        command: ['tfsec', '{{workingDirectory}}', '--no-colour'],
        cwd: '.',
        continueOnFailure: config.securitySoftFail,
        exitCodes: SCANNER_EXIT_CODES,
      },
    ],
  };
}

function docsJob(): JobSpec {
  return {
    name: 'docs',
    gate: docsGate,
    runsLast: true,
    steps: [
      {
        name: 'terraform-docs',
        command: [
          '{{terraformDocsBin}}',
          'markdown',
          'table',
          '--output-file',
          '{{docsOutputFile}}',
          '--output-mode',
          'inject',
          '.',
        ],
        cwd: '{{workingDirectory}}',
        continueOnFailure: false,
      },
      {
        name: 'stage-docs',
        command: ['git', 'add', '--', '{{docsPath}}'],
        cwd: '.',
        continueOnFailure: false,
      },
      {
        name: 'detect-changes',
        command: ['git', 'diff', '--cached', '--quiet', '--', '{{docsPath}}'],
        cwd: '.',
        continueOnFailure: false,
        exitCodes: DIFF_EXIT_CODES,
      },
      {
        name: 'commit-docs',
        command: [
          'git',
          '-c',
          `user.name=${BOT_NAME}`,
          '-c',
          `user.email=${BOT_EMAIL}`,
          'commit',
          '-m',
          DOCS_COMMIT_MESSAGE,
          '--',
          '{{docsPath}}',
        ],
        cwd: '.',
        continueOnFailure: false,
        condition: docsChanged,
      },
      {
        name: 'push-docs',
        command: ['git', 'push'],
        cwd: '.',
        continueOnFailure: false,
        condition: docsChanged,
      },
    ],
  };
}

function dependencyUpdateJob(config: RunConfiguration): JobSpec {
  return {
    name: 'dependency-update',
    gate: dependencyUpdateGate,
    steps: [
      {
        name: 'renovate',
        command: ['renovate'],
        cwd: '.',
        env: {
          RENOVATE_CONFIG_FILE: '{{renovateConfigFile}}',
          LOG_LEVEL: config.renovateDebug ? 'debug' : 'info',
        },
        secrets: { RENOVATE_TOKEN: RENOVATE_TOKEN_SECRET },
        continueOnFailure: false,
      },
    ],
  };
}

/**
 * Builds every job the pipeline knows, in declaration order
 */
export function buildJobs(config: RunConfiguration): JobSpec[] {
  return [lintJob(), securityJob(config), docsJob(), dependencyUpdateJob(config)];
}
