/**
 * Unit tests for the job catalogue and step rendering
 */

import { resolveConfiguration } from './config';
import {
  DIFF_EXIT_CODES,
  FMT_EXIT_CODES,
  RENOVATE_TOKEN_SECRET,
  buildJobs,
  interpretExitCode,
  renderStep,
  renderTemplate,
  templateVariables,
  type ToolPaths,
} from './jobs';
import { Secret } from './secrets';
import type { JobSpec, StepResult, StepSpec } from './types';

jest.mock('@actions/core');

describe('jobs', () => {
  const tools: ToolPaths = {
    toolBin: '/opt/terraform',
    tflintBin: '/opt/tflint',
    terraformDocsBin: '/opt/terraform-docs',
  };

  function findStep(job: JobSpec, name: string): StepSpec {
    const step = job.steps.find((candidate) => candidate.name === name);
    if (!step) {
      throw new Error(`No step ${name} in ${job.name}`);
    }
    return step;
  }

  function findJob(jobs: JobSpec[], name: string): JobSpec {
    const job = jobs.find((candidate) => candidate.name === name);
    if (!job) {
      throw new Error(`No job ${name}`);
    }
    return job;
  }

  describe('renderTemplate', () => {
    it('should substitute placeholders', () => {
      expect(renderTemplate('{{a}}/{{ b }}', { a: 'x', b: 'y' })).toBe('x/y');
    });

    it('should leave text without placeholders untouched', () => {
      expect(renderTemplate('-check', {})).toBe('-check');
    });

    it('should throw on unknown placeholders', () => {
      expect(() => renderTemplate('{{missing}}', {})).toThrow('Unknown template variable: missing');
    });
  });

  describe('templateVariables', () => {
    it('should expose configuration fields, the docs path and tool paths', () => {
      const variables = templateVariables(
        resolveConfiguration({ workingDirectory: 'infra', docsOutputFile: 'docs/README.md' }),
        tools
      );

      expect(variables.workingDirectory).toBe('infra');
      expect(variables.validateDirectory).toBe('infra');
      expect(variables.enableDocs).toBe('false');
      expect(variables.stepTimeoutMinutes).toBe('15');
      expect(variables.docsPath).toBe('infra/docs/README.md');
      expect(variables.toolBin).toBe('/opt/terraform');
    });
  });

  describe('interpretExitCode', () => {
    const plain: StepSpec = { name: 'plain', command: ['true'], cwd: '.', continueOnFailure: false };

    it('should treat 0 as success and anything else as failure without a convention', () => {
      expect(interpretExitCode(plain, 0)).toEqual({ status: 'succeeded' });
      expect(interpretExitCode(plain, 2)).toEqual({ status: 'failed' });
    });

    it('should map fmt exit code 3 to needs-formatting', () => {
      const fmt: StepSpec = { ...plain, exitCodes: FMT_EXIT_CODES };

      expect(interpretExitCode(fmt, 0)).toEqual({ status: 'succeeded', outcome: 'formatted' });
      expect(interpretExitCode(fmt, 3)).toEqual({ status: 'failed', outcome: 'needs-formatting' });
      expect(interpretExitCode(fmt, 2)).toEqual({ status: 'failed' });
    });

    it('should treat a git diff with changes as success', () => {
      const diff: StepSpec = { ...plain, exitCodes: DIFF_EXIT_CODES };

      expect(interpretExitCode(diff, 1)).toEqual({ status: 'succeeded', outcome: 'changed' });
      expect(interpretExitCode(diff, 128)).toEqual({ status: 'failed' });
    });
  });

  describe('buildJobs', () => {
    it('should declare the jobs in order with docs running last', () => {
      const jobs = buildJobs(resolveConfiguration({}));

      expect(jobs.map((job) => job.name)).toEqual(['lint', 'security', 'docs', 'dependency-update']);
      expect(jobs.filter((job) => job.runsLast).map((job) => job.name)).toEqual(['docs']);
    });

    it('should order lint steps so init runs before validate', () => {
      const lint = findJob(buildJobs(resolveConfiguration({})), 'lint');

      expect(lint.steps.map((step) => step.name)).toEqual([
        'fmt',
        'init',
        'validate',
        'tflint-init',
        'tflint',
      ]);
    });

    it('should make scanner steps continue on failure only in soft-fail mode', () => {
      const strict = findJob(buildJobs(resolveConfiguration({})), 'security');
      const soft = findJob(buildJobs(resolveConfiguration({ securitySoftFail: true })), 'security');

      expect(strict.steps.map((step) => step.continueOnFailure)).toEqual([false, false]);
      expect(soft.steps.map((step) => step.continueOnFailure)).toEqual([true, true]);
    });

    it('should commit docs only when changes were detected', () => {
      const config = resolveConfiguration({ enableDocs: true });
      const docs = findJob(buildJobs(config), 'docs');
      const commit = findStep(docs, 'commit-docs');
      const trigger = { kind: 'push', eventName: 'push', branch: 'main', actor: 'alice' } as const;
      const detected = (outcome: string): StepResult[] => [
        { name: 'detect-changes', status: 'succeeded', exitCode: 0, stdout: '', stderr: '', outcome, durationMs: 1 },
      ];

      expect(commit.condition?.({ config, trigger, previous: detected('changed') })).toBe(true);
      expect(commit.condition?.({ config, trigger, previous: detected('unchanged') })).toBe(false);
      expect(commit.condition?.({ config, trigger, previous: [] })).toBe(false);
    });
  });

  describe('renderStep', () => {
    it('should render the fmt step against the working directory', () => {
      const config = resolveConfiguration({ workingDirectory: 'infra' });
      const fmt = findStep(findJob(buildJobs(config), 'lint'), 'fmt');

      expect(renderStep(fmt, templateVariables(config, tools), new Map())).toEqual({
        file: '/opt/terraform',
        args: ['fmt', '-check', '-recursive', '-diff'],
        cwd: 'infra',
        env: {},
      });
    });

    it('should run init and validate in the validate directory', () => {
      const config = resolveConfiguration({ workingDirectory: 'infra', validateDirectory: 'infra/prod' });
      const lint = findJob(buildJobs(config), 'lint');
      const variables = templateVariables(config, tools);

      expect(renderStep(findStep(lint, 'init'), variables, new Map()).cwd).toBe('infra/prod');
      expect(renderStep(findStep(lint, 'validate'), variables, new Map()).args).toEqual([
        'validate',
        '-no-color',
      ]);
    });

    it('should render the docs commit against the docs path', () => {
      const config = resolveConfiguration({ workingDirectory: 'infra', enableDocs: true });
      const docs = findJob(buildJobs(config), 'docs');
      const rendered = renderStep(findStep(docs, 'detect-changes'), templateVariables(config, tools), new Map());

      expect(rendered).toEqual({
        file: 'git',
        args: ['diff', '--cached', '--quiet', '--', 'infra/README.md'],
        cwd: '.',
        env: {},
      });
    });

    it('should hand the renovate token only to the renovate step', () => {
      const config = resolveConfiguration({ renovateDebug: true, renovateConfigFile: '.github/renovate.json' });
      const secrets = new Map([[RENOVATE_TOKEN_SECRET, new Secret('test-token')]]);
      const jobs = buildJobs(config);
      const variables = templateVariables(config, tools);

      expect(renderStep(findStep(findJob(jobs, 'dependency-update'), 'renovate'), variables, secrets)).toEqual({
        file: 'renovate',
        args: [],
        cwd: '.',
        env: {
          RENOVATE_CONFIG_FILE: '.github/renovate.json',
          LOG_LEVEL: 'debug',
          RENOVATE_TOKEN: 'test-token',
        },
      });
      expect(renderStep(findStep(findJob(jobs, 'lint'), 'fmt'), variables, secrets).env).toEqual({});
    });

    it('should fail when a bound secret is missing', () => {
      const config = resolveConfiguration({});
      const renovate = findStep(findJob(buildJobs(config), 'dependency-update'), 'renovate');

      expect(() => renderStep(renovate, templateVariables(config, tools), new Map())).toThrow(
        "Secret 'renovate-token' is required but was not provided"
      );
    });
  });
});
